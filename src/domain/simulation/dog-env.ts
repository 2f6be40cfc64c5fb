import { SeededRng } from '../../utils/seeded-rng.js';
import { clamp } from '../behavior/behavior-inputs.js';
import type { ActOutcome, RoboDogBrain } from '../brain/robodog-brain.js';
import { DEFAULT_CONFIDENCE, DEFAULT_REWARD_BIAS } from '../brain/robodog-brain.js';

export interface DogState {
  readonly fatigue: number;
  /** -1..1 */
  readonly mood: number;
  /** Exponential moving average of recent successes. */
  readonly reward_hist: number;
}

export interface StepObservation extends DogState {
  readonly success: boolean;
  readonly reward: number;
  readonly success_probability: number;
}

export interface BrainStep {
  readonly brain: ActOutcome;
  readonly state: StepObservation;
}

export interface EpisodeReport {
  readonly history: readonly BrainStep[];
  readonly successRate: number;
  readonly finalState: DogState;
}

export interface StepOptions {
  readonly confidence?: number;
  readonly rewardBias?: number;
}

const NEUTRAL_STATE: DogState = { fatigue: 0, mood: 0, reward_hist: 0.5 };

/**
 * Toy model of a dog reacting to the brain's decisions. Success becomes less
 * likely as fatigue builds and more likely in a good mood.
 */
export class DogEnv {
  private readonly rng: SeededRng;
  private state: DogState = NEUTRAL_STATE;

  constructor(seed = 42) {
    this.rng = new SeededRng(seed);
  }

  reset(): DogState {
    this.state = NEUTRAL_STATE;
    return this.observe();
  }

  observe(): DogState {
    return { ...this.state };
  }

  step(_action: string, score: number): StepObservation {
    const successP = 0.5 + 0.4 * score - 0.25 * this.state.fatigue + 0.1 * this.state.mood;
    const success = this.rng.random() < clamp(successP, 0.05, 0.95);

    const fatigue = clamp(this.state.fatigue + (success ? 0.1 : 0.05));
    const moodChange = success ? 0.15 : -0.1 - 0.05 * fatigue;
    const reward = success ? 1 : 0;

    this.state = {
      fatigue,
      mood: clamp(this.state.mood + moodChange, -1, 1),
      reward_hist: 0.8 * this.state.reward_hist + 0.2 * reward,
    };

    return { ...this.observe(), success, reward, success_probability: clamp(successP) };
  }

  /** Feeds the current mood and fatigue into the brain, then advances the dog. */
  async runBrainStep(brain: RoboDogBrain, command: string, options: StepOptions = {}): Promise<BrainStep> {
    const current = this.observe();
    const outcome = await brain.handleCommand(
      {
        text: command,
        confidence: options.confidence ?? DEFAULT_CONFIDENCE,
        rewardBias: options.rewardBias ?? DEFAULT_REWARD_BIAS,
        mood: current.mood,
        fatigue: current.fatigue,
      },
      'simulation'
    );
    return { brain: outcome, state: this.step(outcome.action, outcome.score) };
  }

  async simulateCommands(
    brain: RoboDogBrain,
    commands: readonly string[],
    options: StepOptions = {}
  ): Promise<EpisodeReport> {
    const history: BrainStep[] = [];
    let successes = 0;
    for (const text of commands) {
      const step = await this.runBrainStep(brain, text, options);
      history.push(step);
      if (step.state.success) successes++;
    }
    return {
      history,
      successRate: commands.length > 0 ? successes / commands.length : 0,
      finalState: this.observe(),
    };
  }
}
