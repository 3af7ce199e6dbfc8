export class GeminiApiError extends Error {
  public readonly status?: number;
  public readonly details?: unknown;

  constructor(message: string, options?: { status?: number; details?: unknown }) {
    super(message);
    this.name = 'GeminiApiError';
    this.status = options?.status;
    this.details = options?.details;
  }

  /** Rate limits, server overloads and failures without a status are worth another try. */
  public get retryable(): boolean {
    return !this.status || this.status === 429 || this.status >= 500;
  }
}

export class GeminiModelUnavailableError extends GeminiApiError {
  public readonly model: string;

  constructor(model: string, status?: number, details?: unknown) {
    super(`Gemini model "${model}" is unavailable`, { status, details });
    this.name = 'GeminiModelUnavailableError';
    this.model = model;
  }

  public override get retryable(): boolean {
    return false;
  }
}

export class GeminiResponseSchemaError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'GeminiResponseSchemaError';
    this.path = path;
  }
}
