import type { SeededRng } from '../../utils/seeded-rng.js';

interface ForwardPass {
  readonly score: number;
  readonly hidden: readonly number[];
}

/**
 * One tanh hidden layer and a sigmoid output unit, trained with plain SGD on
 * squared error.
 */
export class AdaptiveMlp {
  readonly hiddenWeights: number[][];
  readonly hiddenBias: number[];
  readonly outputWeights: number[];
  outputBias = 0;

  constructor(
    readonly inputSize: number,
    readonly hiddenSize: number,
    readonly learningRate: number,
    rng: SeededRng
  ) {
    const scale = 1 / Math.sqrt(Math.max(1, inputSize));
    this.hiddenWeights = Array.from({ length: hiddenSize }, () =>
      Array.from({ length: inputSize }, () => rng.uniform(-scale, scale))
    );
    this.hiddenBias = new Array<number>(hiddenSize).fill(0);
    this.outputWeights = Array.from({ length: hiddenSize }, () => rng.uniform(-scale, scale));
  }

  forward(features: readonly number[]): ForwardPass {
    const hidden = this.hiddenWeights.map((row, i) => {
      let activation = this.hiddenBias[i] ?? 0;
      row.forEach((w, j) => {
        activation += w * (features[j] ?? 0);
      });
      return Math.tanh(activation);
    });
    let output = this.outputBias;
    hidden.forEach((h, i) => {
      output += (this.outputWeights[i] ?? 0) * h;
    });
    return { score: 1 / (1 + Math.exp(-output)), hidden };
  }

  predict(features: readonly number[]): number {
    return this.forward(features).score;
  }

  /** One gradient step; returns the loss `0.5 * (score - target)^2` before the update. */
  trainStep(features: readonly number[], target: number): number {
    const { score, hidden } = this.forward(features);
    const error = score - target;
    const dOutput = error * score * (1 - score);
    const gradHidden = hidden.map((h, i) => (1 - h * h) * (this.outputWeights[i] ?? 0) * dOutput);

    hidden.forEach((h, i) => {
      this.outputWeights[i] = (this.outputWeights[i] ?? 0) - this.learningRate * dOutput * h;
    });
    this.outputBias -= this.learningRate * dOutput;

    this.hiddenWeights.forEach((row, i) => {
      const g = gradHidden[i] ?? 0;
      for (let j = 0; j < row.length; j++) {
        row[j] = (row[j] ?? 0) - this.learningRate * g * (features[j] ?? 0);
      }
      this.hiddenBias[i] = (this.hiddenBias[i] ?? 0) - this.learningRate * g;
    });

    return 0.5 * error * error;
  }

  /**
   * Identity hidden layer with output weights set to `featureWeights`. tanh
   * bends it slightly; it is a warm start, not an exact linear model.
   */
  setLinearMapping(featureWeights: readonly number[], bias = 0): void {
    this.hiddenWeights.forEach((row, i) => {
      row.fill(0);
      if (i < this.inputSize) row[i] = 1;
      this.hiddenBias[i] = 0;
    });
    for (let i = 0; i < this.hiddenSize; i++) {
      this.outputWeights[i] = featureWeights[i] ?? 0;
    }
    this.outputBias = bias;
  }
}
