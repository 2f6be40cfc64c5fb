import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { FetchLike } from '../infrastructure/http/fetch-client.js';
import { fetchChecked } from '../infrastructure/http/fetch-client.js';

export interface SpeakOptions {
  readonly voice?: string;
  readonly language?: string;
}

/**
 * Speech output. `speak` never rejects: engines that depend on a network
 * back end fall back to console output.
 */
export interface SpeechSynthesizer {
  readonly name: string;
  speak(text: string, options?: SpeakOptions): Promise<void>;
}

export type LineWriter = (line: string) => void;

export const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export class ConsoleTts implements SpeechSynthesizer {
  readonly name = 'console';

  constructor(private readonly write: LineWriter = stdoutWriter) {}

  async speak(text: string, options: SpeakOptions = {}): Promise<void> {
    this.write(`[${options.voice ?? 'TTS'}] ${text}`);
  }
}

export interface OpenAiTtsConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly voice: string;
  readonly model: string;
  readonly language: string | undefined;
  readonly timeoutMs?: number;
  /** Directory for synthesised clips; defaults to the OS temp dir. */
  readonly outputDir?: string;
}

/**
 * Synthesises speech through an OpenAI-compatible `/audio/speech` endpoint and
 * stores the clip as a wav file, announcing where it went on `write`.
 */
export class OpenAiTts implements SpeechSynthesizer {
  readonly name = 'openai';

  constructor(
    private readonly config: OpenAiTtsConfig,
    private readonly fetchFn: FetchLike,
    private readonly logger: Logger,
    private readonly fallback: SpeechSynthesizer = new ConsoleTts(),
    private readonly write: LineWriter = stdoutWriter
  ) {}

  async speak(text: string, options: SpeakOptions = {}): Promise<void> {
    if (!text) return;
    const voice = options.voice ?? this.config.voice;
    const language = options.language ?? this.config.language;
    const payload = {
      model: this.config.model,
      voice,
      input: text,
      format: 'wav',
      ...(language ? { language } : {}),
    };

    const audio = await fetchChecked(
      this.fetchFn,
      `${this.config.baseUrl}/audio/speech`,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.apiKey}`, 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
      { timeoutMs: this.config.timeoutMs }
    ).andThen((response) =>
      ResultAsync.fromPromise(
        response.arrayBuffer().then((buffer) => new Uint8Array(buffer)),
        (e) => ({ code: 'TTS_BODY_UNREADABLE' as const, message: e instanceof Error ? e.message : String(e) })
      )
    );

    if (audio.isErr()) {
      this.logger.warn({ err: audio.error }, 'Speech synthesis unavailable; falling back to console output');
      await this.fallback.speak(text, { voice });
      return;
    }
    if (audio.value.byteLength === 0) {
      await this.fallback.speak(text, { voice });
      return;
    }

    try {
      const file = await this.persist(audio.value);
      this.logger.info({ file, voice }, 'Synthesised speech saved');
      this.write(`[${voice}] Аудіо збережено у ${file}`);
    } catch (e) {
      this.logger.warn({ err: e }, 'Cannot save synthesised speech; falling back to console output');
      await this.fallback.speak(text, { voice });
    }
  }

  private async persist(audio: Uint8Array): Promise<string> {
    const dir = await fs.mkdtemp(path.join(this.config.outputDir ?? os.tmpdir(), 'vct-openai-'));
    const file = path.join(dir, 'speech.wav');
    await fs.writeFile(file, audio);
    return file;
  }
}
