/** A transient oracle failure (rate limit or overload) worth retrying. */
export class TemporaryError extends Error {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = 'TemporaryError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class OracleUnavailableError extends Error {
  public readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = 'OracleUnavailableError';
    this.attempts = attempts;
  }
}

export class MalformedOracleOutputError extends Error {
  public readonly stage: string;
  public readonly responseText: string;

  constructor(stage: string, message: string, responseText: string) {
    super(`${stage}: ${message}`);
    this.name = 'MalformedOracleOutputError';
    this.stage = stage;
    this.responseText = responseText;
  }
}

/** A stage ran before the stage that produces its input. */
export class MissingPreconditionError extends Error {
  public readonly stage: string;
  public readonly missing: string;

  constructor(stage: string, missing: string) {
    super(`${stage} requires ${missing}, which has not been produced yet`);
    this.name = 'MissingPreconditionError';
    this.stage = stage;
    this.missing = missing;
  }
}

export class CatalogLoadError extends Error {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Unable to load course catalog from ${path}: ${message}`);
    this.name = 'CatalogLoadError';
    this.path = path;
  }
}
