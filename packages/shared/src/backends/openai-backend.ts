/**
 * OpenAI-Compatible Chat Backend
 *
 * Serves OpenAI, Groq and Gemini models through the openai SDK. SDK retries
 * are disabled; the adapter owns retries and the per-call timeout.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { ExtractionFailedError, ExtractionTimeoutError } from '../errors';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter, llmTokensCounter } from '../metrics';
import { getDefaultTemplate, type MemoTemplate } from '../templates';
import type { BackendUsage, CanonicalRecord } from '../types';
import { buildMemoPrompt, MEMO_RESPONSE_SCHEMA, parseMemoResponse } from './llm-extraction';
import { PROVIDERS, type OpenAiCompatibleProviderId } from './providers';
import type { BackendCallContext, BackendOutput, ExtractionBackend } from './types';

interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  response_format:
    | { type: 'json_schema'; json_schema: { name: string; strict: boolean; schema: Record<string, unknown> } }
    | { type: 'json_object' };
  max_tokens: number;
  temperature: number;
}

/**
 * The parts of a chat completion this backend reads
 */
export interface ChatCompletionResult {
  id: string;
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

/**
 * The subset of the SDK client this backend calls. An `OpenAI` instance
 * satisfies it.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionRequest,
        options?: { signal?: AbortSignal; timeout?: number }
      ): PromiseLike<ChatCompletionResult>;
    };
  };
}

export interface OpenAiBackendOptions {
  provider: OpenAiCompatibleProviderId;
  model?: string;
  /** Defaults to "<provider>:<model>" */
  id?: string;
  apiKey?: string;
  baseURL?: string;
  /** Pre-built client, e.g. a stub in tests */
  client?: ChatCompletionsClient;
  template?: MemoTemplate;
  maxOutputTokens?: number;
  maxSourceChars?: number;
}

export class OpenAiCompatibleBackend implements ExtractionBackend {
  readonly id: string;
  readonly description: string;
  readonly kind = 'model';
  readonly capabilities = { freeTextGeneration: true, structuredFields: true };

  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly provider: OpenAiCompatibleProviderId;
  private readonly template: MemoTemplate;
  private readonly maxOutputTokens: number;
  private readonly maxSourceChars: number;

  constructor(options: OpenAiBackendOptions) {
    const settings = PROVIDERS[options.provider];

    this.provider = options.provider;
    this.model = options.model || settings.defaultModel;
    this.id = options.id || `${options.provider}:${this.model}`;
    this.description = `${options.provider} chat completion (${this.model})`;
    this.template = options.template ?? getDefaultTemplate();
    this.maxOutputTokens = options.maxOutputTokens ?? config.maxOutputTokens;
    this.maxSourceChars = options.maxSourceChars ?? config.maxSourceChars;

    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey || settings.apiKey(),
        baseURL: options.baseURL || settings.baseURL,
        maxRetries: 0, // Disable SDK retries - the adapter retries timeouts
      });
  }

  async extract(record: CanonicalRecord, ctx: BackendCallContext): Promise<BackendOutput> {
    const prompt = buildMemoPrompt(this.template, record, this.maxSourceChars);
    const settings = PROVIDERS[this.provider];

    logger.info('Requesting memo from model', {
      provider: this.provider,
      model: this.model,
      text_length: record.raw_text.length,
    });

    const endTimer = llmRequestDurationHistogram.startTimer({ model: this.model });

    let response: ChatCompletionResult;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          response_format:
            settings.responseFormat === 'json_schema'
              ? { type: 'json_schema', json_schema: MEMO_RESPONSE_SCHEMA }
              : { type: 'json_object' },
          max_tokens: this.maxOutputTokens,
          temperature: 0,
        },
        { signal: ctx.signal, timeout: ctx.timeoutMs }
      );
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new ExtractionTimeoutError(this.id, ctx.timeoutMs, { cause: error });
      }
      throw error;
    } finally {
      endTimer();
    }

    llmRequestsCounter.inc({ model: this.model, status: 'success' });

    const usage: BackendUsage | undefined = response.usage
      ? { input_tokens: response.usage.prompt_tokens, output_tokens: response.usage.completion_tokens }
      : undefined;
    if (usage) {
      llmTokensCounter.inc({ model: this.model, direction: 'input' }, usage.input_tokens);
      llmTokensCounter.inc({ model: this.model, direction: 'output' }, usage.output_tokens);
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new ExtractionFailedError(this.id, `Empty response from ${this.provider}`);
    }

    logger.info('Model memo received', {
      model: response.model || this.model,
      request_id: response.id,
      tokens_used: response.usage?.total_tokens,
    });

    return {
      ...parseMemoResponse(content),
      model: response.model || this.model,
      usage,
    };
  }
}
