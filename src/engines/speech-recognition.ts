import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { FetchLike, HttpCallError } from '../infrastructure/http/fetch-client.js';
import { fetchChecked } from '../infrastructure/http/fetch-client.js';

export type RecognitionError =
  | { readonly code: 'STT_AUDIO_UNREADABLE'; readonly message: string }
  | { readonly code: 'STT_REQUEST_FAILED'; readonly message: string; readonly cause: HttpCallError }
  | { readonly code: 'STT_BAD_RESPONSE'; readonly message: string };

export interface SpeechRecognizer {
  readonly name: string;
  /** Resolves to the recognised text, or `''` when nothing was recognised. */
  transcribe(wavPath: string): ResultAsync<string, RecognitionError>;
}

export const DEFAULT_FILENAME_KEYWORDS: Readonly<Record<string, string>> = {
  sydity: 'сидіти',
  lezhaty: 'лежати',
  do_mene: 'до мене',
  bark: 'голос',
};

/**
 * Offline recogniser that guesses the command from the recording's file name
 * (`sydity_01.wav` -> "сидіти"). Never fails.
 */
export class RuleBasedStt implements SpeechRecognizer {
  readonly name = 'rule-based';

  constructor(private readonly keywords: Readonly<Record<string, string>> = DEFAULT_FILENAME_KEYWORDS) {}

  transcribe(wavPath: string): ResultAsync<string, RecognitionError> {
    if (!wavPath) return okAsync('');
    const name = wavPath.toLowerCase();
    for (const [keyword, phrase] of Object.entries(this.keywords)) {
      if (name.includes(keyword)) return okAsync(phrase);
    }
    return okAsync('');
  }
}

export interface WhisperSttConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly timeoutMs?: number;
}

const TranscriptionResponse = z.object({ text: z.string() });

/** Uploads the clip to an OpenAI-compatible `/audio/transcriptions` endpoint. */
export class OpenAiWhisperStt implements SpeechRecognizer {
  readonly name = 'openai-whisper';

  constructor(
    private readonly config: WhisperSttConfig,
    private readonly fetchFn: FetchLike
  ) {}

  transcribe(wavPath: string): ResultAsync<string, RecognitionError> {
    if (!wavPath) return okAsync('');
    const url = `${this.config.baseUrl}/audio/transcriptions`;

    return ResultAsync.fromPromise(fs.readFile(wavPath), (e): RecognitionError => ({
      code: 'STT_AUDIO_UNREADABLE',
      message: `Cannot read ${wavPath}: ${e instanceof Error ? e.message : String(e)}`,
    }))
      .andThen((audio) => {
        const form = new FormData();
        form.append('model', this.config.model);
        form.append('file', new Blob([new Uint8Array(audio)], { type: 'audio/wav' }), path.basename(wavPath));
        return fetchChecked(
          this.fetchFn,
          url,
          { method: 'POST', headers: { Authorization: `Bearer ${this.config.apiKey}` }, body: form },
          { timeoutMs: this.config.timeoutMs }
        ).mapErr((cause): RecognitionError => ({ code: 'STT_REQUEST_FAILED', message: cause.message, cause }));
      })
      .andThen((response) =>
        ResultAsync.fromPromise(response.json(), (): RecognitionError => ({
          code: 'STT_BAD_RESPONSE',
          message: `${url} returned a body that is not JSON`,
        }))
      )
      .andThen((body: unknown) => {
        const parsed = TranscriptionResponse.safeParse(body);
        return parsed.success
          ? okAsync(parsed.data.text.trim())
          : errAsync<string, RecognitionError>({
              code: 'STT_BAD_RESPONSE',
              message: `${url} returned no transcription text`,
            });
      });
  }
}
