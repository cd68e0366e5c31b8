export type FeatureSchemaName = 'win_loss' | 'over_under';

/** Ordered feature values, in the order the paired scaler was fitted on. */
export interface FeatureVector {
  schema: FeatureSchemaName;
  names: readonly string[];
  values: readonly number[];
}
