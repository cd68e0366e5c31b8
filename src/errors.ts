export type EngineErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'TEAM_NOT_FOUND'
  | 'MODELS_NOT_LOADED'
  | 'FEATURE_UNAVAILABLE'
  | 'INSUFFICIENT_DATA'
  | 'MODEL_OUTPUT_INVALID';

/**
 * Base class for every failure the prediction and validation engine reports.
 * Callers switch on `code`; the subclasses only add structured context.
 */
export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { code: EngineErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

/** Statistics source missing, empty or malformed. */
export class DataUnavailableError extends EngineError {
  readonly code = 'DATA_UNAVAILABLE';

  constructor(
    message: string,
    readonly source: string | null = null,
  ) {
    super(message);
  }
}

export class TeamNotFoundError extends EngineError {
  readonly code = 'TEAM_NOT_FOUND';

  constructor(
    readonly teamName: string,
    readonly season: string,
  ) {
    super(`Team "${teamName}" not found for season ${season}`);
  }
}

export class ModelsNotLoadedError extends EngineError {
  readonly code = 'MODELS_NOT_LOADED';

  constructor(readonly missing: readonly string[]) {
    super(`Models not loaded: ${missing.join(', ') || 'unknown'}`);
  }
}

/** A required statistic was missing or non-numeric on a resolved team row. */
export class FeatureUnavailableError extends EngineError {
  readonly code = 'FEATURE_UNAVAILABLE';

  constructor(
    readonly teamName: string,
    readonly field: string,
  ) {
    super(`Statistic "${field}" unavailable for ${teamName}`);
  }
}

export class InsufficientDataError extends EngineError {
  readonly code = 'INSUFFICIENT_DATA';
}

export class ModelOutputInvalidError extends EngineError {
  readonly code = 'MODEL_OUTPUT_INVALID';
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
