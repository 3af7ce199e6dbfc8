export interface GeminiConfig {
  apiKey: string;
  model: string;
  apiBaseUrl: string;
}

const DEFAULT_MODEL = process.env.GEMINI_MODEL ?? 'gemini-flash-latest';
const DEFAULT_API_BASE = process.env.GEMINI_API_BASE_URL ?? 'https://generativelanguage.googleapis.com';

export function getGeminiApiBaseUrl(): string {
  return DEFAULT_API_BASE.replace(/\/$/, '');
}

export function getGeminiConfig(): GeminiConfig {
  const apiKey = process.env.GEMINI_API_KEY;
  if (!apiKey) {
    throw new Error('Missing GEMINI_API_KEY environment variable');
  }

  return {
    apiKey,
    model: DEFAULT_MODEL,
    apiBaseUrl: getGeminiApiBaseUrl(),
  };
}

export function getGeminiModel(): string {
  return DEFAULT_MODEL;
}
