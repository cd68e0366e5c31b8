import { z } from 'zod';
import { LogisticRegression } from './logistic-regression.js';
import { StandardScaler } from './standard-scaler.js';
import type { ArtifactName, Classifier, FeatureScaler } from '../types/model.js';

const finite = z.number().finite();

export const classifierArtifactSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('logistic_regression'),
    coefficients: z.array(finite).min(1),
    intercept: finite,
  }),
]);

export const scalerArtifactSchema = z
  .object({
    kind: z.literal('standard_scaler'),
    featureNames: z.array(z.string().min(1)).min(1),
    mean: z.array(finite),
    scale: z.array(finite),
  })
  .refine((s) => s.mean.length === s.featureNames.length && s.scale.length === s.featureNames.length, {
    message: 'mean and scale must have one entry per feature name',
  });

export type ClassifierArtifact = z.infer<typeof classifierArtifactSchema>;
export type ScalerArtifact = z.infer<typeof scalerArtifactSchema>;

export const ARTIFACT_FILES: Record<ArtifactName, string> = {
  winLossModel: 'nba_win_loss_model.json',
  overUnderModel: 'nba_over_under_model.json',
  winLossScaler: 'win_loss_scaler.json',
  overUnderScaler: 'over_under_scaler.json',
};

export const ARTIFACT_NAMES: readonly ArtifactName[] = [
  'winLossModel',
  'overUnderModel',
  'winLossScaler',
  'overUnderScaler',
];

export function classifierFromArtifact(artifact: ClassifierArtifact): Classifier {
  switch (artifact.kind) {
    case 'logistic_regression':
      return new LogisticRegression(artifact.coefficients, artifact.intercept);
  }
}

export function scalerFromArtifact(artifact: ScalerArtifact): StandardScaler {
  return new StandardScaler(artifact.featureNames, artifact.mean, artifact.scale);
}

/**
 * Serializable form of a live classifier, or null when it is not one of the
 * artifact kinds this package knows how to write.
 */
export function classifierToArtifact(model: Classifier): ClassifierArtifact | null {
  if (model instanceof LogisticRegression) {
    return {
      kind: 'logistic_regression',
      coefficients: [...model.coefficients],
      intercept: model.intercept,
    };
  }
  return null;
}

export function scalerToArtifact(scaler: FeatureScaler): ScalerArtifact | null {
  if (scaler instanceof StandardScaler) {
    return {
      kind: 'standard_scaler',
      featureNames: [...scaler.featureNames],
      mean: [...scaler.mean],
      scale: [...scaler.scale],
    };
  }
  return null;
}
