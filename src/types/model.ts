/**
 * Anything that can score a feature row. The engine only ever reads the
 * positive-class probability at index 1.
 */
export interface Classifier {
  /** Input width, when the classifier knows it. */
  readonly featureCount?: number;
  predictProba(features: readonly number[]): readonly [number, number];
}

export interface FeatureScaler {
  readonly featureNames: readonly string[];
  transform(features: readonly number[]): number[];
}

export type ArtifactName =
  | 'winLossModel'
  | 'overUnderModel'
  | 'winLossScaler'
  | 'overUnderScaler';

export type ArtifactStatus =
  | { state: 'loaded'; file: string }
  | { state: 'missing'; file: string }
  | { state: 'invalid'; file: string; message: string };

export interface LoadResult {
  directory: string;
  artifacts: Record<ArtifactName, ArtifactStatus>;
  ready: boolean;
  loadedAt: Date;
}

export interface ModelSet {
  winLossModel: Classifier;
  overUnderModel: Classifier;
  winLossScaler: FeatureScaler;
  overUnderScaler: FeatureScaler;
}
