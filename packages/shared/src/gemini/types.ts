import type { JsonSchema } from '../schemas/jsonSchemas.js';

export interface GeminiContentPart {
  text: string;
}

export interface GeminiContent {
  role: 'user' | 'system' | 'model';
  parts: GeminiContentPart[];
}

export interface GenerateContentOptions {
  model: string;
  contents: GeminiContent[];
  systemInstruction?: GeminiContent;
  responseSchema?: JsonSchema;
  responseMimeType?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export interface GenerateContentResult {
  rawResponse: unknown;
  text: string;
  model: string;
  finishReason?: string;
  /** True when generation stopped at the output token limit. */
  truncated: boolean;
}
