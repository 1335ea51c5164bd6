/**
 * Backend Registry
 *
 * Registry pattern for extraction backends.
 * Backends are registered by id and looked up by the pipeline per run.
 */

import { UnknownBackendError } from '../errors';
import { logger } from '../logger';
import { AnthropicBackend } from './anthropic-backend';
import { OpenAiCompatibleBackend } from './openai-backend';
import { inferProvider, isProviderId, PROVIDERS, type ProviderId } from './providers';
import { RuleBasedBackend, RULE_BASED_BACKEND_ID } from './rule-based';
import type { ExtractionBackend } from './types';

/**
 * Map of backend ids to backends
 */
const backendRegistry = new Map<string, ExtractionBackend>();

/**
 * Register a backend. Overwrites any existing backend with the same id.
 */
export function registerBackend(backend: ExtractionBackend): void {
  backendRegistry.set(backend.id, backend);

  logger.debug('Registered backend', {
    backend_id: backend.id,
    kind: backend.kind,
    description: backend.description,
  });
}

export function getBackend(backendId: string): ExtractionBackend | undefined {
  return backendRegistry.get(backendId);
}

/**
 * Get a backend by id, throwing UnknownBackendError if not registered.
 */
export function getBackendOrThrow(backendId: string): ExtractionBackend {
  const backend = backendRegistry.get(backendId);
  if (!backend) {
    throw new UnknownBackendError(backendId);
  }
  return backend;
}

export function hasBackend(backendId: string): boolean {
  return backendRegistry.has(backendId);
}

export function getRegisteredBackendIds(): string[] {
  return Array.from(backendRegistry.keys());
}

/**
 * Clear all registered backends.
 * Useful for testing.
 */
export function clearRegistry(): void {
  backendRegistry.clear();
}

/**
 * Create a backend from a backend id:
 * - "rule-based"
 * - "<provider>:<model>", e.g. "openai:gpt-4o-mini", "groq:llama-3.1-70b-versatile"
 * - "<model>" alone, provider inferred from the model family
 */
export function createBackendFromId(id: string): ExtractionBackend {
  const trimmed = id.trim();
  if (trimmed === RULE_BASED_BACKEND_ID) {
    return new RuleBasedBackend();
  }

  const separator = trimmed.indexOf(':');
  const prefix = separator === -1 ? '' : trimmed.slice(0, separator);
  const [provider, model]: [ProviderId, string] = isProviderId(prefix)
    ? [prefix, trimmed.slice(separator + 1)]
    : [inferProvider(trimmed), trimmed];

  if (!model) {
    throw new UnknownBackendError(id);
  }

  if (!PROVIDERS[provider].apiKey()) {
    logger.warn('Provider API key is not set; calls to this backend will fail', {
      provider,
      api_key_env: PROVIDERS[provider].apiKeyEnv,
    });
  }

  if (provider === 'anthropic') {
    return new AnthropicBackend({ model });
  }
  return new OpenAiCompatibleBackend({ provider, model });
}

/**
 * Resolve backend ids for a run: registered backends first, otherwise built
 * from the id and registered.
 */
export function resolveBackends(ids: string[]): ExtractionBackend[] {
  return ids.map((id) => {
    const existing = backendRegistry.get(id);
    if (existing) return existing;

    const backend = createBackendFromId(id);
    registerBackend(backend);
    return backend;
  });
}
