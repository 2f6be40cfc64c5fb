export function clamp(value: number, low = 0, high = 1): number {
  return Math.max(low, Math.min(high, value));
}

export const FEATURE_NAMES = [
  'stimulus',
  'confidence',
  'reward_bias',
  'mood',
  'stress',
  'fatigue',
  'environmental_complexity',
  'social_engagement',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/**
 * Signals fed to the behaviour policy. `mood` ranges over [-1, 1]; every other
 * field over [0, 1].
 */
export interface BehaviorInputs {
  readonly stimulus: number;
  readonly confidence: number;
  readonly rewardBias: number;
  readonly mood: number;
  readonly stress?: number;
  readonly fatigue?: number;
  readonly environmentalComplexity?: number;
  readonly socialEngagement?: number;
}

/** Normalised feature vector, ordered as `FEATURE_NAMES`. */
export function asVector(inputs: BehaviorInputs): number[] {
  return [
    clamp(inputs.stimulus),
    clamp(inputs.confidence),
    clamp(inputs.rewardBias),
    clamp((inputs.mood + 1) / 2),
    clamp(inputs.stress ?? 0),
    clamp(inputs.fatigue ?? 0),
    clamp(inputs.environmentalComplexity ?? 0),
    clamp(inputs.socialEngagement ?? 0),
  ];
}
