export type {
  BackendKind,
  BackendCapabilities,
  BackendCallContext,
  BackendOutput,
  ExtractionBackend,
  ExtractionOutcome,
} from './types';

export {
  extractWithPolicy,
  acceptOutput,
  readNotAvailable,
  backoffDelayMs,
  defaultExtractionPolicy,
  type ExtractionPolicy,
} from './adapter';

export { InMemoryExtractionCache, cacheKey, type ExtractionCache } from './cache';

export { MODEL_PRICING, getModelPrice, estimateCostUsd, type ModelPrice } from './pricing';

export {
  PROVIDERS,
  isProviderId,
  inferProvider,
  type ProviderId,
  type ProviderSettings,
  type ResponseFormatMode,
} from './providers';

export {
  MEMO_RESPONSE_SCHEMA,
  MAX_QUOTE_CHARS,
  buildMemoPrompt,
  extractJsonObject,
  parseMemoResponse,
  type MemoPrompt,
} from './llm-extraction';

export {
  OpenAiCompatibleBackend,
  type OpenAiBackendOptions,
  type ChatCompletionsClient,
  type ChatCompletionResult,
} from './openai-backend';

export {
  AnthropicBackend,
  type AnthropicBackendOptions,
  type MessagesClient,
  type MessageResult,
} from './anthropic-backend';

export {
  RuleBasedBackend,
  RULE_BASED_BACKEND_ID,
  extractFields,
  buildNarrative,
} from './rule-based';

export {
  registerBackend,
  getBackend,
  getBackendOrThrow,
  hasBackend,
  getRegisteredBackendIds,
  clearRegistry,
  createBackendFromId,
  resolveBackends,
} from './registry';
