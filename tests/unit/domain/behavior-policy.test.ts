import { describe, it, expect } from 'vitest';
import { BehaviorPolicy, DEFAULT_FEATURE_WEIGHTS, parseTrainingData } from '../../../src/domain/behavior/behavior-policy.js';
import { asVector, FEATURE_NAMES } from '../../../src/domain/behavior/behavior-inputs.js';
import type { BehaviorInputs } from '../../../src/domain/behavior/behavior-inputs.js';

const EAGER: BehaviorInputs = { stimulus: 1, confidence: 0.9, rewardBias: 0.6, mood: 0.5, stress: 0.1, fatigue: 0.2 };
const IDLE: BehaviorInputs = { stimulus: 0, confidence: 0.2, rewardBias: 0.1, mood: -0.5, stress: 0.8, fatigue: 0.9 };

/** Output of the warm-started network: sigmoid(sum w_i * tanh(x_i) + bias). */
function warmStartScore(inputs: BehaviorInputs, bias = 0): number {
  const vector = asVector(inputs);
  const z = FEATURE_NAMES.reduce((sum, name, i) => sum + DEFAULT_FEATURE_WEIGHTS[name] * Math.tanh(vector[i] ?? 0), bias);
  return 1 / (1 + Math.exp(-z));
}

describe('asVector', () => {
  it('orders features, rescales mood and clamps', () => {
    expect(asVector({ stimulus: 2, confidence: -1, rewardBias: 0.3, mood: 0, fatigue: 0.25 })).toEqual([
      1, 0, 0.3, 0.5, 0, 0.25, 0, 0,
    ]);
  });
});

describe('BehaviorPolicy', () => {
  it('treats an all-numeric config as a weight map', () => {
    const policy = new BehaviorPolicy({ stimulus: 0.4 });

    expect(policy.decide('SIT', EAGER).score).toBeCloseTo(warmStartScore(EAGER), 12);
  });

  it('reads the bias from the weight map', () => {
    const policy = new BehaviorPolicy({ stimulus: 0.4, bias: -5 });

    expect(policy.decide('SIT', EAGER).score).toBeCloseTo(warmStartScore(EAGER, -5), 12);
    expect(policy.decide('SIT', EAGER).score).toBeLessThan(0.5);
  });

  it('scores an eager dog above an idle one', () => {
    const policy = new BehaviorPolicy({ weights: { stimulus: 0.4 } });

    expect(policy.decide('SIT', EAGER).score).toBeGreaterThan(policy.decide('SIT', IDLE).score);
  });

  it('echoes the action and keeps the score in [0, 1]', () => {
    const decision = new BehaviorPolicy({ seed: 11 }).decide('COME', EAGER);

    expect(decision.action).toBe('COME');
    expect(decision.score).toBeGreaterThanOrEqual(0);
    expect(decision.score).toBeLessThanOrEqual(1);
  });

  it('is deterministic for a fixed seed', () => {
    const a = new BehaviorPolicy({ seed: 5, hidden_size: 12 });
    const b = new BehaviorPolicy({ seed: 5, hidden_size: 12 });

    expect(a.decide('SIT', IDLE).score).toBe(b.decide('SIT', IDLE).score);
  });

  it('lowers the training loss on a separable dataset', () => {
    const policy = new BehaviorPolicy({ seed: 3, learning_rate: 0.5 });
    const dataset = [
      { inputs: EAGER, target: 1 },
      { inputs: IDLE, target: 0 },
    ];

    const history = policy.train(dataset, 300);

    expect(history).toHaveLength(300);
    expect(history[history.length - 1]).toBeLessThan(history[0] ?? 0);
    expect(policy.isTrained).toBe(true);
    expect(policy.decide('SIT', EAGER).score).toBeGreaterThan(0.5);
    expect(policy.decide('SIT', IDLE).score).toBeLessThan(0.5);
  });

  it('ignores an empty dataset', () => {
    const policy = new BehaviorPolicy({ seed: 1 });

    expect(policy.train([])).toEqual([]);
    expect(policy.isTrained).toBe(false);
  });

  it('trains at construction from configured examples', () => {
    const policy = new BehaviorPolicy({
      seed: 9,
      epochs: 4,
      training_data: [
        { inputs: { stimulus: 1, confidence: 0.9, reward_bias: 0.5, mood: 0 }, target: 1 },
        { inputs: { stimulus: 0, confidence: 0.1, reward_bias: 0.5, mood: 0 }, score: 0 },
      ],
    });

    expect(policy.isTrained).toBe(true);
    expect(policy.trainingHistory).toHaveLength(4);
  });
});

describe('parseTrainingData', () => {
  it('accepts target or score, clamps it and skips malformed items', () => {
    const examples = parseTrainingData([
      { inputs: { stimulus: 1, confidence: 0.5, reward_bias: 0.5, mood: 0, social_engagement: 0.7 }, target: 1.4 },
      { inputs: { stimulus: 0, confidence: 0.5, reward_bias: 0.5, mood: 0 }, score: 0.2 },
      { inputs: { stimulus: 'high' }, target: 1 },
      'noise',
    ]);

    expect(examples).toHaveLength(2);
    expect(examples[0]?.target).toBe(1);
    expect(examples[0]?.inputs.socialEngagement).toBe(0.7);
    expect(examples[1]?.target).toBe(0.2);
    expect(examples[1]?.inputs.rewardBias).toBe(0.5);
  });
});
