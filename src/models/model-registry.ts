import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { FEATURE_SCHEMAS } from '../features/feature-calculator.js';
import {
  ARTIFACT_FILES,
  ARTIFACT_NAMES,
  classifierArtifactSchema,
  classifierFromArtifact,
  classifierToArtifact,
  scalerArtifactSchema,
  scalerFromArtifact,
  scalerToArtifact,
} from './artifacts.js';
import type {
  ArtifactName,
  ArtifactStatus,
  Classifier,
  FeatureScaler,
  LoadResult,
  ModelSet,
} from '../types/model.js';
import type { FeatureSchemaName } from '../types/feature.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'model-registry' });

const SCHEMA_FOR: Record<ArtifactName, FeatureSchemaName> = {
  winLossModel: 'win_loss',
  overUnderModel: 'over_under',
  winLossScaler: 'win_loss',
  overUnderScaler: 'over_under',
};

type Loaded = Partial<ModelSet>;

function sameOrder(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function widthMismatch(featureCount: number | undefined, schema: readonly string[]): string | null {
  if (featureCount === undefined || featureCount === schema.length) return null;
  return `expects ${featureCount} features, schema has ${schema.length}`;
}

function orderMismatch(featureNames: readonly string[], schema: readonly string[]): string | null {
  if (sameOrder(featureNames, schema)) return null;
  return `feature names [${featureNames.join(', ')}] do not match schema [${schema.join(', ')}]`;
}

/**
 * Checks a full set against the feature schemas, the same way `load` checks
 * each file. Classifiers that do not report a width are taken as they are.
 */
function modelSetMismatches(models: ModelSet): string[] {
  const found: [ArtifactName, string | null][] = [
    ['winLossModel', widthMismatch(models.winLossModel.featureCount, FEATURE_SCHEMAS.win_loss)],
    ['overUnderModel', widthMismatch(models.overUnderModel.featureCount, FEATURE_SCHEMAS.over_under)],
    ['winLossScaler', orderMismatch(models.winLossScaler.featureNames, FEATURE_SCHEMAS.win_loss)],
    ['overUnderScaler', orderMismatch(models.overUnderScaler.featureNames, FEATURE_SCHEMAS.over_under)],
  ];
  return found.flatMap(([name, message]) => (message === null ? [] : [`${name} ${message}`]));
}

function assertModelSet(models: ModelSet): void {
  const mismatches = modelSetMismatches(models);
  if (mismatches.length > 0) {
    throw new Error(`Model set does not match feature schemas: ${mismatches.join('; ')}`);
  }
}

function parseClassifier(raw: unknown, schema: readonly string[]): Classifier {
  const parsed = classifierArtifactSchema.safeParse(raw);
  if (!parsed.success) throw new Error(parsed.error.issues[0]?.message ?? 'invalid');
  const mismatch = widthMismatch(parsed.data.coefficients.length, schema);
  if (mismatch) throw new Error(mismatch);
  return classifierFromArtifact(parsed.data);
}

function parseScaler(raw: unknown, schema: readonly string[]): FeatureScaler {
  const parsed = scalerArtifactSchema.safeParse(raw);
  if (!parsed.success) throw new Error(parsed.error.issues[0]?.message ?? 'invalid');
  const mismatch = orderMismatch(parsed.data.featureNames, schema);
  if (mismatch) throw new Error(mismatch);
  return scalerFromArtifact(parsed.data);
}

/**
 * Reads one artifact. Absence is `missing`; bad content and any other read
 * failure (a directory in its place, no permission) are `invalid`.
 */
async function readArtifact<T>(
  directory: string,
  name: ArtifactName,
  parseArtifact: (raw: unknown, schema: readonly string[]) => T,
): Promise<[T | undefined, ArtifactStatus]> {
  const file = path.join(directory, ARTIFACT_FILES[name]);
  const schema = FEATURE_SCHEMAS[SCHEMA_FOR[name]];
  try {
    const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
    return [parseArtifact(raw, schema), { state: 'loaded', file }];
  } catch (err) {
    if (isNotFound(err)) {
      log.warn({ artifact: name, file }, 'Model artifact not found');
      return [undefined, { state: 'missing', file }];
    }
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ artifact: name, file, reason: message }, 'Model artifact invalid');
    return [undefined, { state: 'invalid', file, message }];
  }
}

/**
 * Holds the two classifier/scaler pairs. Every load or save replaces the
 * whole snapshot, so a prediction that already took `models()` keeps a
 * consistent set while a reload is in progress.
 */
export class ModelRegistry {
  private snapshot: Loaded = {};
  private lastLoad: LoadResult | null = null;

  async load(directory: string): Promise<LoadResult> {
    const [winLossModel, winLossModelStatus] = await readArtifact(directory, 'winLossModel', parseClassifier);
    const [overUnderModel, overUnderModelStatus] = await readArtifact(
      directory,
      'overUnderModel',
      parseClassifier,
    );
    const [winLossScaler, winLossScalerStatus] = await readArtifact(directory, 'winLossScaler', parseScaler);
    const [overUnderScaler, overUnderScalerStatus] = await readArtifact(
      directory,
      'overUnderScaler',
      parseScaler,
    );

    this.snapshot = { winLossModel, overUnderModel, winLossScaler, overUnderScaler };
    const result: LoadResult = {
      directory,
      artifacts: {
        winLossModel: winLossModelStatus,
        overUnderModel: overUnderModelStatus,
        winLossScaler: winLossScalerStatus,
        overUnderScaler: overUnderScalerStatus,
      },
      ready: this.isReady(),
      loadedAt: new Date(),
    };
    this.lastLoad = result;
    log.info({ directory, ready: result.ready, missing: this.missing() }, 'Model artifacts loaded');
    return result;
  }

  isReady(): boolean {
    return this.missing().length === 0;
  }

  missing(): ArtifactName[] {
    return ARTIFACT_NAMES.filter((name) => this.snapshot[name] === undefined);
  }

  /** Current full set, or null while any artifact is absent. */
  models(): ModelSet | null {
    const { winLossModel, overUnderModel, winLossScaler, overUnderScaler } = this.snapshot;
    if (!winLossModel || !overUnderModel || !winLossScaler || !overUnderScaler) return null;
    return { winLossModel, overUnderModel, winLossScaler, overUnderScaler };
  }

  status(): { ready: boolean; missing: ArtifactName[]; lastLoad: LoadResult | null } {
    return { ready: this.isReady(), missing: this.missing(), lastLoad: this.lastLoad };
  }

  /** Install an in-memory set without touching disk. */
  use(models: ModelSet): void {
    assertModelSet(models);
    this.snapshot = { ...models };
  }

  /**
   * Write all four artifacts. Files go to temporaries first and are renamed
   * into place only once every write succeeded; the in-memory snapshot is
   * replaced only after that.
   */
  async save(directory: string, models: ModelSet): Promise<void> {
    assertModelSet(models);
    const payloads = new Map<ArtifactName, unknown>([
      ['winLossModel', classifierToArtifact(models.winLossModel)],
      ['overUnderModel', classifierToArtifact(models.overUnderModel)],
      ['winLossScaler', scalerToArtifact(models.winLossScaler)],
      ['overUnderScaler', scalerToArtifact(models.overUnderScaler)],
    ]);
    for (const [name, payload] of payloads) {
      if (payload === null) throw new Error(`Artifact ${name} has no serializable form`);
    }

    const suffix = `.tmp-${process.pid}-${Date.now()}`;
    const written: string[] = [];
    try {
      for (const [name, payload] of payloads) {
        const tmp = path.join(directory, ARTIFACT_FILES[name] + suffix);
        await writeFile(tmp, JSON.stringify(payload, null, 2) + '\n', 'utf-8');
        written.push(tmp);
      }
      for (const name of payloads.keys()) {
        const target = path.join(directory, ARTIFACT_FILES[name]);
        await rename(target + suffix, target);
      }
    } catch (err) {
      await Promise.all(written.map((tmp) => rm(tmp, { force: true })));
      log.error({ err, directory }, 'Saving model artifacts failed');
      throw err;
    }

    this.snapshot = { ...models };
    log.info({ directory }, 'Model artifacts saved');
  }
}
