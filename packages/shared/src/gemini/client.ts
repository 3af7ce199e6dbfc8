import { getGeminiApiBaseUrl, getGeminiConfig } from '../config/gemini.js';
import { GeminiApiError, GeminiModelUnavailableError, GeminiResponseSchemaError } from './errors.js';
import type {
  GeminiContent,
  GeminiContentPart,
  GenerateContentOptions,
  GenerateContentResult,
} from './types.js';

export interface GeminiClientOptions {
  apiKey?: string;
  apiBaseUrl?: string;
}

const GEMINI_STRUCTURED_OUTPUT_DOC_URL = 'https://ai.google.dev/gemini-api/docs/structured-output';

const SUPPORTED_SCHEMA_KEYS = new Set([
  'type',
  'format',
  'description',
  'nullable',
  'enum',
  'properties',
  'required',
  'items',
  'minItems',
  'maxItems',
  'minimum',
  'maximum',
  'anyOf',
  'title',
  'propertyOrdering',
]);

const STRING_ARRAY_KEYS = new Set(['enum', 'required', 'propertyOrdering']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function schemaError(message: string, path: string): GeminiResponseSchemaError {
  return new GeminiResponseSchemaError(`${message} See ${GEMINI_STRUCTURED_OUTPUT_DOC_URL}.`, path);
}

/** Rejects schemas that use keys outside the OpenAPI subset Gemini accepts. */
export function assertValidResponseSchema(schema: unknown, path = 'responseSchema'): void {
  if (!isPlainObject(schema)) {
    throw schemaError('Gemini responseSchema must be an object.', path);
  }

  for (const [key, value] of Object.entries(schema)) {
    const currentPath = `${path}.${key}`;

    if (!SUPPORTED_SCHEMA_KEYS.has(key)) {
      throw schemaError(`Gemini responseSchema key "${key}" is not supported.`, currentPath);
    }

    if (key === 'type' && typeof value !== 'string') {
      throw schemaError('Gemini responseSchema expects "type" to be a single string.', currentPath);
    }

    if (key === 'nullable' && typeof value !== 'boolean') {
      throw schemaError('Gemini responseSchema expects "nullable" to be a boolean.', currentPath);
    }

    if (STRING_ARRAY_KEYS.has(key)) {
      if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
        throw schemaError(`Gemini responseSchema expects "${key}" to be an array of strings.`, currentPath);
      }
    }

    if (key === 'items') {
      assertValidResponseSchema(value, currentPath);
    }

    if (key === 'properties') {
      if (!isPlainObject(value)) {
        throw schemaError('Gemini responseSchema expects "properties" to be an object.', currentPath);
      }
      for (const [propKey, propValue] of Object.entries(value)) {
        assertValidResponseSchema(propValue, `${currentPath}.${propKey}`);
      }
    }

    if (key === 'anyOf') {
      if (!Array.isArray(value)) {
        throw schemaError('Gemini responseSchema expects "anyOf" to be an array.', currentPath);
      }
      value.forEach((entry, index) => assertValidResponseSchema(entry, `${currentPath}[${index}]`));
    }
  }
}

async function readBody(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { statusText: response.statusText };
    }
    throw error;
  }
}

function firstTextPart(candidate: Record<string, unknown>): string | undefined {
  const content = candidate.content;
  if (!isPlainObject(content) || !Array.isArray(content.parts)) {
    return undefined;
  }
  const texts = content.parts
    .filter(isPlainObject)
    .map((part) => part.text)
    .filter((text): text is string => typeof text === 'string');
  return texts.length > 0 ? texts.join('') : undefined;
}

export class GeminiClient {
  private readonly apiKey: string;
  private readonly apiBaseUrl: string;
  private readonly availableModels = new Set<string>();

  constructor(options?: GeminiClientOptions) {
    this.apiKey = options?.apiKey ?? getGeminiConfig().apiKey;
    this.apiBaseUrl = (options?.apiBaseUrl ?? getGeminiApiBaseUrl()).replace(/\/$/, '');
  }

  public async ensureModelAvailable(model: string): Promise<void> {
    if (this.availableModels.has(model)) {
      return;
    }
    const url = `${this.apiBaseUrl}/v1beta/models/${encodeURIComponent(model)}?key=${this.apiKey}`;
    const response = await fetch(url, { method: 'GET' });
    if (!response.ok) {
      throw new GeminiModelUnavailableError(model, response.status, await readBody(response));
    }
    this.availableModels.add(model);
  }

  public async generateContent(options: GenerateContentOptions): Promise<GenerateContentResult> {
    const model = options.model;
    await this.ensureModelAvailable(model);

    if (options.responseSchema) {
      assertValidResponseSchema(options.responseSchema);
    }

    const generationConfig: Record<string, unknown> = {
      temperature: options.temperature ?? 0,
      response_mime_type: options.responseMimeType ?? 'application/json',
    };
    if (options.maxOutputTokens) {
      generationConfig.maxOutputTokens = options.maxOutputTokens;
    }
    if (options.responseSchema) {
      generationConfig.response_schema = options.responseSchema;
    }

    const payload: Record<string, unknown> = {
      contents: options.contents,
      generationConfig,
    };
    if (options.systemInstruction) {
      payload.systemInstruction = options.systemInstruction;
    }

    const url = `${this.apiBaseUrl}/v1beta/models/${encodeURIComponent(model)}:generateContent?key=${this.apiKey}`;
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    const body = await readBody(response);

    if (!response.ok) {
      throw new GeminiApiError('Gemini generateContent call failed', {
        status: response.status,
        details: body,
      });
    }

    const candidates = isPlainObject(body) && Array.isArray(body.candidates) ? body.candidates : [];
    const firstCandidate: unknown = candidates[0];

    if (!isPlainObject(firstCandidate)) {
      throw new GeminiApiError('Gemini response missing candidates', { details: body });
    }

    const finishReason =
      typeof firstCandidate.finishReason === 'string' ? firstCandidate.finishReason : undefined;
    const truncated = finishReason === 'MAX_TOKENS';

    if (finishReason && finishReason !== 'STOP' && !truncated) {
      throw new GeminiApiError(`Gemini did not finish successfully (${finishReason})`, {
        details: firstCandidate,
      });
    }

    const text = firstTextPart(firstCandidate);
    if (text === undefined) {
      throw new GeminiApiError('Gemini response does not contain text', {
        details: firstCandidate,
      });
    }

    return {
      rawResponse: body,
      text,
      model: isPlainObject(body) && typeof body.modelVersion === 'string' ? body.modelVersion : model,
      finishReason,
      truncated,
    };
  }
}

export function buildUserContent(parts: GeminiContentPart[]): GeminiContent {
  return {
    role: 'user',
    parts,
  };
}

export function buildSystemInstruction(text: string): GeminiContent {
  return {
    role: 'system',
    parts: [{ text }],
  };
}

export function buildTextPart(text: string): GeminiContentPart {
  return { text };
}
