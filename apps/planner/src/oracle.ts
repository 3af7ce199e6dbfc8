import pRetry, { AbortError } from 'p-retry';
import { setTimeout as sleep } from 'node:timers/promises';

import {
  GeminiApiError,
  GeminiClient,
  buildSystemInstruction,
  buildTextPart,
  buildUserContent,
  getGeminiModel,
} from '@studyplan/shared';
import type { JsonSchema } from '@studyplan/shared';

import type { PlannerConfig } from './config/env.js';
import { OracleUnavailableError, TemporaryError } from './errors.js';
import type { Logger } from './logger.js';

export type OracleStage = 'rank' | 'generate' | 'repair' | 'preferences';

export interface OracleRequest {
  stage: OracleStage;
  prompt: string;
  systemInstruction?: string;
  responseSchema?: JsonSchema;
}

/** Black-box text generator. Responses are untrusted and parsed by the caller. */
export interface Oracle {
  generate(request: OracleRequest): Promise<string>;
}

type ContentGenerator = Pick<GeminiClient, 'generateContent'>;

export interface GeminiOracleOptions {
  client: ContentGenerator;
  model: string;
  logger: Logger;
  maxAttempts: number;
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<unknown>;
}

const RETRY_HINT_PADDING_SECONDS = 5;

/** Delay suggested by a rate-limit response, falling back to `fallbackMs`. */
export function retryDelayFor(error: GeminiApiError, fallbackMs: number): number {
  const text = `${error.message} ${JSON.stringify(error.details ?? null)}`;
  const hint = /retry in (\d+(?:\.\d+)?)s/i.exec(text);
  if (hint) {
    return (Math.ceil(Number(hint[1])) + RETRY_HINT_PADDING_SECONDS) * 1000;
  }
  const retryDelay = /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/.exec(text);
  if (retryDelay) {
    return Math.ceil(Number(retryDelay[1])) * 1000;
  }
  return fallbackMs;
}

export function mapGeminiError(error: unknown, fallbackDelayMs: number): never {
  if (error instanceof GeminiApiError) {
    if (error.retryable) {
      throw new TemporaryError(error.message, retryDelayFor(error, fallbackDelayMs));
    }
    throw new AbortError(error);
  }
  // fetch rejects with a TypeError when the network is unreachable
  if (error instanceof TypeError) {
    throw new TemporaryError(error.message, fallbackDelayMs);
  }
  if (error instanceof Error) {
    throw new AbortError(error);
  }
  throw new AbortError(String(error));
}

export class GeminiOracle implements Oracle {
  private readonly client: ContentGenerator;
  private readonly model: string;
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(options: GeminiOracleOptions) {
    this.client = options.client;
    this.model = options.model;
    this.logger = options.logger;
    this.maxAttempts = options.maxAttempts;
    this.retryDelayMs = options.retryDelayMs;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  public async generate(request: OracleRequest): Promise<string> {
    try {
      return await pRetry(() => this.callOnce(request), {
        retries: this.maxAttempts - 1,
        minTimeout: 0,
        maxTimeout: 0,
        onFailedAttempt: async (error) => {
          if (!(error instanceof TemporaryError) || error.retriesLeft === 0) {
            return;
          }
          const temporary: TemporaryError = error;
          const delayMs = temporary.retryAfterMs ?? this.retryDelayMs;
          this.logger.warn('oracle:retry', {
            stage: request.stage,
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            delayMs,
            message: error.message,
          });
          await this.sleep(delayMs);
        },
      });
    } catch (error) {
      if (error instanceof TemporaryError) {
        throw new OracleUnavailableError(
          `Oracle unavailable after ${this.maxAttempts} attempts (${request.stage}): ${error.message}`,
          this.maxAttempts,
        );
      }
      throw error;
    }
  }

  private async callOnce(request: OracleRequest): Promise<string> {
    this.logger.debug('oracle:call', {
      stage: request.stage,
      model: this.model,
      promptLength: request.prompt.length,
      schema: Boolean(request.responseSchema),
    });
    try {
      const result = await this.client.generateContent({
        model: this.model,
        contents: [buildUserContent([buildTextPart(request.prompt)])],
        ...(request.systemInstruction
          ? { systemInstruction: buildSystemInstruction(request.systemInstruction) }
          : {}),
        ...(request.responseSchema ? { responseSchema: request.responseSchema } : {}),
      });
      if (result.truncated) {
        this.logger.warn('oracle:truncated', { stage: request.stage, model: result.model });
      }
      return result.text;
    } catch (error) {
      mapGeminiError(error, this.retryDelayMs);
    }
  }
}

export interface CreateGeminiOracleOptions {
  config: PlannerConfig;
  logger: Logger;
}

export function createGeminiOracle({ config, logger }: CreateGeminiOracleOptions): GeminiOracle {
  return new GeminiOracle({
    client: new GeminiClient(),
    model: getGeminiModel(),
    logger,
    maxAttempts: config.oracleMaxAttempts,
    retryDelayMs: config.oracleRetryDelayMs,
  });
}
