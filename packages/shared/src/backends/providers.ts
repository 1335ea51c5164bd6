/**
 * Model Providers
 *
 * Groq and Gemini serve OpenAI-compatible chat endpoints, so one SDK client
 * covers three providers; Anthropic has its own SDK.
 */

import { config } from '../config';

export type ProviderId = 'openai' | 'groq' | 'gemini' | 'anthropic';

export type OpenAiCompatibleProviderId = Exclude<ProviderId, 'anthropic'>;

/**
 * - 'json_schema': strict structured outputs
 * - 'json_object': JSON mode only; the reply is checked against the schema afterwards
 */
export type ResponseFormatMode = 'json_schema' | 'json_object';

export interface ProviderSettings {
  id: ProviderId;
  apiKeyEnv: string;
  apiKey: () => string;
  baseURL?: string;
  defaultModel: string;
  responseFormat: ResponseFormatMode;
}

export const PROVIDERS: Record<ProviderId, ProviderSettings> = {
  openai: {
    id: 'openai',
    apiKeyEnv: 'OPENAI_API_KEY',
    apiKey: () => config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    defaultModel: config.llmModelOpenai,
    responseFormat: 'json_schema',
  },
  groq: {
    id: 'groq',
    apiKeyEnv: 'GROQ_API_KEY',
    apiKey: () => config.groqApiKey,
    baseURL: 'https://api.groq.com/openai/v1',
    defaultModel: 'llama-3.1-70b-versatile',
    responseFormat: 'json_object',
  },
  gemini: {
    id: 'gemini',
    apiKeyEnv: 'GEMINI_API_KEY',
    apiKey: () => config.geminiApiKey,
    baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
    defaultModel: 'gemini-1.5-flash',
    responseFormat: 'json_schema',
  },
  anthropic: {
    id: 'anthropic',
    apiKeyEnv: 'ANTHROPIC_API_KEY',
    apiKey: () => config.anthropicApiKey,
    defaultModel: config.llmModelAnthropic,
    responseFormat: 'json_object',
  },
};

export function isProviderId(value: string): value is ProviderId {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, value);
}

/**
 * Provider for a bare model name, following the model families each
 * provider serves.
 */
export function inferProvider(model: string): ProviderId {
  if (model.startsWith('claude')) return 'anthropic';
  if (model.startsWith('gemini')) return 'gemini';
  if (model.startsWith('llama') || model.startsWith('mixtral')) return 'groq';
  return 'openai';
}
