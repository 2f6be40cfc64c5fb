import { z } from 'zod';
import { SeededRng, randomSeed } from '../../utils/seeded-rng.js';
import { AdaptiveMlp } from './adaptive-mlp.js';
import { FEATURE_NAMES, asVector, clamp } from './behavior-inputs.js';
import type { BehaviorInputs, FeatureName } from './behavior-inputs.js';

export interface BehaviorDecision {
  readonly action: string;
  readonly score: number;
}

export interface TrainingExample {
  readonly inputs: BehaviorInputs;
  readonly target: number;
}

export const DEFAULT_FEATURE_WEIGHTS: Readonly<Record<FeatureName, number>> = {
  stimulus: 0.4,
  confidence: 0.3,
  reward_bias: 0.2,
  mood: 0.1,
  stress: -0.1,
  fatigue: -0.1,
  environmental_complexity: -0.05,
  social_engagement: 0.05,
};

const DEFAULT_LEARNING_RATE = 0.05;
const DEFAULT_EPOCHS = 150;

const InputsPayload = z
  .object({
    stimulus: z.number(),
    confidence: z.number(),
    reward_bias: z.number(),
    mood: z.number(),
    stress: z.number().optional(),
    fatigue: z.number().optional(),
    environmental_complexity: z.number().optional(),
    social_engagement: z.number().optional(),
  })
  .transform(
    (raw): BehaviorInputs => ({
      stimulus: raw.stimulus,
      confidence: raw.confidence,
      rewardBias: raw.reward_bias,
      mood: raw.mood,
      stress: raw.stress,
      fatigue: raw.fatigue,
      environmentalComplexity: raw.environmental_complexity,
      socialEngagement: raw.social_engagement,
    })
  );

const TrainingItem = z.union([
  z.object({ inputs: InputsPayload, target: z.number() }),
  z.object({ inputs: InputsPayload, score: z.number() }).transform((item) => ({ inputs: item.inputs, target: item.score })),
]);

const PolicyOptions = z.object({
  weights: z.record(z.string(), z.coerce.number()).optional(),
  learning_rate: z.coerce.number().positive().optional(),
  hidden_size: z.coerce.number().int().positive().optional(),
  seed: z.coerce.number().int().optional(),
  training_data: z.array(z.unknown()).optional(),
  epochs: z.coerce.number().int().optional(),
});

function isWeightMap(config: Readonly<Record<string, unknown>>): config is Record<string, number> {
  const values = Object.values(config);
  return values.length > 0 && values.every((v) => typeof v === 'number');
}

/**
 * Scores an action given the current inputs. Starts from a linear weight map
 * and optionally trains on labelled examples from the settings file.
 *
 * Unknown or malformed option values fall back to their defaults; malformed
 * training items are skipped.
 */
export class BehaviorPolicy {
  readonly trainingHistory: number[] = [];
  private readonly rng: SeededRng;
  private readonly model: AdaptiveMlp;
  private trained = false;

  constructor(config: Readonly<Record<string, unknown>> = {}) {
    let weights: Record<string, number> = {};
    let options: z.infer<typeof PolicyOptions> = {};

    if (isWeightMap(config)) {
      weights = config;
    } else {
      const parsed = PolicyOptions.safeParse(config);
      if (parsed.success) {
        options = parsed.data;
        weights = options.weights ?? {};
      }
    }

    const featureCount = FEATURE_NAMES.length;
    this.rng = new SeededRng(options.seed ?? randomSeed());
    this.model = new AdaptiveMlp(
      featureCount,
      Math.max(options.hidden_size ?? featureCount, featureCount),
      options.learning_rate ?? DEFAULT_LEARNING_RATE,
      this.rng
    );

    if (Object.keys(weights).length > 0) {
      this.warmStart(weights);
    }

    const dataset = parseTrainingData(options.training_data ?? []);
    if (dataset.length > 0) {
      this.train(dataset, options.epochs ?? DEFAULT_EPOCHS);
    }
  }

  get isTrained(): boolean {
    return this.trained;
  }

  /** Returns the mean loss of each epoch. */
  train(dataset: readonly TrainingExample[], epochs = DEFAULT_EPOCHS): number[] {
    if (dataset.length === 0) return [];
    const data = [...dataset];
    const history: number[] = [];
    for (let epoch = 0; epoch < Math.max(1, epochs); epoch++) {
      this.rng.shuffle(data);
      let total = 0;
      for (const example of data) {
        total += this.model.trainStep(asVector(example.inputs), clamp(example.target));
      }
      history.push(total / data.length);
    }
    this.trainingHistory.push(...history);
    this.trained = true;
    return history;
  }

  decide(action: string, inputs: BehaviorInputs): BehaviorDecision {
    return { action, score: clamp(this.model.predict(asVector(inputs))) };
  }

  private warmStart(weights: Readonly<Record<string, number>>): void {
    const features = FEATURE_NAMES.map((name) => weights[name] ?? DEFAULT_FEATURE_WEIGHTS[name]);
    this.model.setLinearMapping(features, weights['bias'] ?? 0);
  }
}

export function parseTrainingData(items: readonly unknown[]): TrainingExample[] {
  const examples: TrainingExample[] = [];
  for (const item of items) {
    const parsed = TrainingItem.safeParse(item);
    if (parsed.success) {
      examples.push({ inputs: parsed.data.inputs, target: clamp(parsed.data.target) });
    }
  }
  return examples;
}
