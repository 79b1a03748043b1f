import type { ProviderName } from '../types/translation';

export const GEMINI_OPENAI_COMPATIBLE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai';
export const OPENAI_URL = 'https://api.openai.com/v1';

export const DEFAULT_MODEL = 'gemini-2.5-flash-lite';

export const MODEL_ENDPOINTS: ReadonlyArray<readonly [model: string, url: string]> = [
  ['gemini-2.5-pro', GEMINI_OPENAI_COMPATIBLE_URL],
  ['gemini-2.5-flash', GEMINI_OPENAI_COMPATIBLE_URL],
  ['gemini-2.5-flash-lite', GEMINI_OPENAI_COMPATIBLE_URL],
  ['gemini-1.5-pro', GEMINI_OPENAI_COMPATIBLE_URL],
  ['gemini-1.5-flash', GEMINI_OPENAI_COMPATIBLE_URL],
  ['gpt-4', OPENAI_URL],
  ['gpt-4-turbo', OPENAI_URL],
  ['gpt-4o', OPENAI_URL],
  ['gpt-4o-mini', OPENAI_URL],
  ['gpt-3.5-turbo', OPENAI_URL],
  ['gpt-3.5-turbo-16k', OPENAI_URL],
];

// Checked in order against the endpoint URL.
export const PROVIDER_HOSTS: ReadonlyArray<readonly [host: string, provider: ProviderName]> = [
  ['generativelanguage.googleapis.com', 'Google Gemini'],
  ['api.openai.com', 'OpenAI'],
];

export const PROVIDER_ENV_VARS: Partial<Record<ProviderName, string>> = {
  OpenAI: 'OPENAI_API_KEY',
  'Google Gemini': 'GOOGLE_AI_API_KEY',
};

export const PROVIDER_CREDENTIAL_URLS: Partial<Record<ProviderName, string>> = {
  OpenAI: 'https://platform.openai.com/api-keys',
  'Google Gemini': 'https://aistudio.google.com/app/apikey',
};
