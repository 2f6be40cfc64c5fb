import type { Logger } from '../../core/logging/index.js';
import type { RoboDogSettings } from '../../config/robodog-settings.js';
import type { Clock } from '../../runtime/ports/clock.js';
import type { SpeechRecognizer } from '../../engines/speech-recognition.js';
import { RuleBasedStt } from '../../engines/speech-recognition.js';
import type { SpeechSynthesizer } from '../../engines/speech-synthesis.js';
import type { RewardActuator } from '../../hardware/reward-actuator.js';
import type { CommandSource, MetricsRecorder } from '../../infrastructure/metrics/brain-metrics.js';
import type { BehaviorPolicy } from '../behavior/behavior-policy.js';
import type { BehaviorInputs } from '../behavior/behavior-inputs.js';
import { clamp } from '../behavior/behavior-inputs.js';
import { RewardGuard } from './reward-guard.js';

export const NO_ACTION = 'NONE';
export const REWARD_SECONDS = 0.4;
export const UNRECOGNISED_PHRASE = 'Команду не розпізнано';

export const DEFAULT_CONFIDENCE = 0.85;
export const DEFAULT_REWARD_BIAS = 0.5;
export const DEFAULT_MOOD = 0;

export interface ActCommand {
  readonly text: string;
  readonly confidence: number;
  readonly rewardBias: number;
  /** -1..1 */
  readonly mood: number;
  /** When absent, derived from the time since the last reward. */
  readonly fatigue?: number;
}

export interface ActOutcome {
  readonly action: string;
  readonly score: number;
  readonly rewarded: boolean;
}

export interface RoboDogBrainDeps {
  readonly settings: RoboDogSettings;
  readonly policy: BehaviorPolicy;
  readonly recognizer: SpeechRecognizer;
  readonly synthesizer: SpeechSynthesizer;
  readonly actuator: RewardActuator;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly metrics: MetricsRecorder;
  readonly fallbackRecognizer?: SpeechRecognizer;
  readonly guard?: RewardGuard;
}

export function normalizePhrase(value: string): string {
  return value.toLowerCase().replace(/[\s_-]+/g, '');
}

export function commandWithDefaults(text: string, overrides: Partial<Omit<ActCommand, 'text'>> = {}): ActCommand {
  return {
    text,
    confidence: overrides.confidence ?? DEFAULT_CONFIDENCE,
    rewardBias: overrides.rewardBias ?? DEFAULT_REWARD_BIAS,
    mood: overrides.mood ?? DEFAULT_MOOD,
    ...(overrides.fatigue !== undefined ? { fatigue: overrides.fatigue } : {}),
  };
}

/**
 * Maps a command to an action, scores it with the behaviour policy, decides
 * on a reward and speaks the result.
 */
export class RoboDogBrain {
  private recognizer: SpeechRecognizer;
  private readonly fallbackRecognizer: SpeechRecognizer;
  private readonly guard: RewardGuard;
  private readonly cooldownMs: number;

  constructor(private readonly deps: RoboDogBrainDeps) {
    this.recognizer = deps.recognizer;
    this.fallbackRecognizer = deps.fallbackRecognizer ?? new RuleBasedStt();
    this.cooldownMs = deps.settings.reward_cooldown_s * 1000;
    this.guard = deps.guard ?? new RewardGuard({ cooldownMs: this.cooldownMs });
  }

  get recognizerName(): string {
    return this.recognizer.name;
  }

  /** First configured phrase contained in the text wins; map order is file order. */
  actionFromText(text: string): string {
    const normalized = normalizePhrase(text);
    for (const [phrase, action] of Object.entries(this.deps.settings.commands_map)) {
      if (normalized.includes(normalizePhrase(phrase))) return action;
    }
    return NO_ACTION;
  }

  async handleCommand(command: ActCommand, source: CommandSource): Promise<ActOutcome> {
    const { settings, policy, synthesizer, logger, metrics } = this.deps;
    const action = this.actionFromText(command.text);
    const inputs = this.buildInputs(action, command, settings.environment_context);

    const decision = policy.decide(action, inputs);
    const rewarded = await this.maybeReward(decision.action, decision.score);

    const feedback = `Дія: ${decision.action} score=${decision.score.toFixed(2)}${rewarded ? ' ✅ винагорода' : ''}`;
    await synthesizer.speak(feedback);
    logger.info({ action: decision.action, score: decision.score, rewarded, source }, feedback);

    metrics.recordCommand(source);
    metrics.recordReward(decision.action, rewarded);
    return { action: decision.action, score: decision.score, rewarded };
  }

  /**
   * Transcribes the clip and handles the result as a CLI command. A failing
   * recogniser is replaced by the rule-based one for the rest of the brain's life.
   */
  async runOnceFromWav(wavPath: string): Promise<ActOutcome> {
    let transcription = await this.recognizer.transcribe(wavPath);
    if (transcription.isErr()) {
      this.deps.logger.warn(
        { err: transcription.error, recognizer: this.recognizer.name },
        'Speech recogniser failed; switching to rule-based fallback'
      );
      this.recognizer = this.fallbackRecognizer;
      transcription = await this.recognizer.transcribe(wavPath);
    }

    const text = transcription.isOk() ? transcription.value : '';
    if (!text) {
      await this.deps.synthesizer.speak(UNRECOGNISED_PHRASE);
      return { action: NO_ACTION, score: 0, rewarded: false };
    }
    return this.handleCommand(commandWithDefaults(text), 'cli');
  }

  private buildInputs(
    action: string,
    command: ActCommand,
    context: Readonly<Record<string, number>>
  ): BehaviorInputs {
    const cooldownS = this.cooldownMs / 1000;
    const last = this.guard.lastRewardAt;
    const sinceRewardS = last !== undefined ? (this.deps.clock.nowMs() - last) / 1000 : cooldownS;
    const fatigue =
      command.fatigue !== undefined ? clamp(command.fatigue) : clamp(sinceRewardS / Math.max(cooldownS * 2, 1));

    return {
      stimulus: action !== NO_ACTION ? 1 : 0,
      confidence: command.confidence,
      rewardBias: command.rewardBias,
      mood: command.mood,
      stress: clamp(1 - command.confidence),
      fatigue,
      environmentalComplexity: clamp(context['complexity'] ?? 0.5),
      socialEngagement: clamp(context['social_engagement'] ?? 0.5),
    };
  }

  private async maybeReward(action: string, score: number): Promise<boolean> {
    if (this.deps.settings.reward_triggers[action] !== true) return false;

    const now = this.deps.clock.nowMs();
    const verdict = this.guard.tryReserve(now, score);
    if (verdict.kind === 'refused') {
      this.deps.logger.debug({ action, score, reason: verdict.reason }, 'Reward refused');
      return false;
    }

    const fired = await this.deps.actuator.trigger(REWARD_SECONDS);
    if (fired.isErr()) {
      this.guard.release(now);
      this.deps.logger.warn({ err: fired.error, action }, 'Reward actuator failed; reward skipped');
      return false;
    }
    return true;
  }
}
