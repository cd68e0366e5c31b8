import type { Classifier } from '../types/model.js';

function sigmoid(z: number): number {
  // Split on sign so exp() never overflows
  if (z >= 0) return 1 / (1 + Math.exp(-z));
  const e = Math.exp(z);
  return e / (1 + e);
}

/** Fitted binary logistic regression: p(1) = sigmoid(w·x + b). */
export class LogisticRegression implements Classifier {
  readonly coefficients: readonly number[];
  readonly intercept: number;

  constructor(coefficients: readonly number[], intercept: number) {
    this.coefficients = Object.freeze([...coefficients]);
    this.intercept = intercept;
  }

  get featureCount(): number {
    return this.coefficients.length;
  }

  decisionFunction(features: readonly number[]): number {
    if (features.length !== this.coefficients.length) {
      throw new RangeError(
        `Expected ${this.coefficients.length} features, got ${features.length}`,
      );
    }
    return this.coefficients.reduce((sum, w, i) => sum + w * (features[i] ?? 0), this.intercept);
  }

  predictProba(features: readonly number[]): readonly [number, number] {
    const p = sigmoid(this.decisionFunction(features));
    return [1 - p, p];
  }
}
