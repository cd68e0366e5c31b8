import type { FeatureScaler } from '../types/model.js';

/** (x - mean) / scale per column; a zero scale passes the centred value through. */
export class StandardScaler implements FeatureScaler {
  readonly featureNames: readonly string[];
  readonly mean: readonly number[];
  readonly scale: readonly number[];

  constructor(featureNames: readonly string[], mean: readonly number[], scale: readonly number[]) {
    if (mean.length !== featureNames.length || scale.length !== featureNames.length) {
      throw new RangeError(
        `Scaler shape mismatch: ${featureNames.length} names, ${mean.length} means, ${scale.length} scales`,
      );
    }
    this.featureNames = Object.freeze([...featureNames]);
    this.mean = Object.freeze([...mean]);
    this.scale = Object.freeze([...scale]);
  }

  transform(features: readonly number[]): number[] {
    if (features.length !== this.mean.length) {
      throw new RangeError(`Expected ${this.mean.length} features, got ${features.length}`);
    }
    return features.map((x, i) => {
      const centred = x - (this.mean[i] ?? 0);
      const s = this.scale[i] ?? 1;
      return s === 0 ? centred : centred / s;
    });
  }
}
