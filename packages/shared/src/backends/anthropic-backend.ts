/**
 * Anthropic Messages Backend
 *
 * Same prompt as the OpenAI-compatible backend. Claude has no strict
 * structured-output mode here, so the JSON object is read out of the text
 * blocks and checked against the response schema.
 */

import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config';
import { ExtractionFailedError, ExtractionTimeoutError } from '../errors';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter, llmTokensCounter } from '../metrics';
import { getDefaultTemplate, type MemoTemplate } from '../templates';
import type { CanonicalRecord } from '../types';
import { buildMemoPrompt, parseMemoResponse } from './llm-extraction';
import { PROVIDERS } from './providers';
import type { BackendCallContext, BackendOutput, ExtractionBackend } from './types';

interface MessageRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
  temperature: number;
}

/**
 * The parts of a Messages API reply this backend reads
 */
export interface MessageResult {
  id: string;
  model: string;
  stop_reason: string | null;
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The subset of the SDK client this backend calls. An `Anthropic` instance
 * satisfies it.
 */
export interface MessagesClient {
  messages: {
    create(
      body: MessageRequest,
      options?: { signal?: AbortSignal; timeout?: number }
    ): PromiseLike<MessageResult>;
  };
}

export interface AnthropicBackendOptions {
  model?: string;
  id?: string;
  apiKey?: string;
  client?: MessagesClient;
  template?: MemoTemplate;
  maxOutputTokens?: number;
  maxSourceChars?: number;
}

const JSON_REPLY_INSTRUCTION =
  '\n\nReply with the JSON object only. Every field object must have kind, text, quote, amount, currency, percentage and date.';

export class AnthropicBackend implements ExtractionBackend {
  readonly id: string;
  readonly description: string;
  readonly kind = 'model';
  readonly capabilities = { freeTextGeneration: true, structuredFields: true };

  private readonly client: MessagesClient;
  private readonly model: string;
  private readonly template: MemoTemplate;
  private readonly maxOutputTokens: number;
  private readonly maxSourceChars: number;

  constructor(options: AnthropicBackendOptions = {}) {
    this.model = options.model || PROVIDERS.anthropic.defaultModel;
    this.id = options.id || `anthropic:${this.model}`;
    this.description = `Anthropic messages (${this.model})`;
    this.template = options.template ?? getDefaultTemplate();
    this.maxOutputTokens = options.maxOutputTokens ?? config.maxOutputTokens;
    this.maxSourceChars = options.maxSourceChars ?? config.maxSourceChars;

    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey || PROVIDERS.anthropic.apiKey(),
        maxRetries: 0,
      });
  }

  async extract(record: CanonicalRecord, ctx: BackendCallContext): Promise<BackendOutput> {
    const prompt = buildMemoPrompt(this.template, record, this.maxSourceChars);

    logger.info('Requesting memo from model', {
      provider: 'anthropic',
      model: this.model,
      text_length: record.raw_text.length,
    });

    const endTimer = llmRequestDurationHistogram.startTimer({ model: this.model });

    let message: MessageResult;
    try {
      message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxOutputTokens,
          system: prompt.system + JSON_REPLY_INSTRUCTION,
          messages: [{ role: 'user', content: prompt.user }],
          temperature: 0,
        },
        { signal: ctx.signal, timeout: ctx.timeoutMs }
      );
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      if (error instanceof Anthropic.APIConnectionTimeoutError) {
        throw new ExtractionTimeoutError(this.id, ctx.timeoutMs, { cause: error });
      }
      throw error;
    } finally {
      endTimer();
    }

    llmRequestsCounter.inc({ model: this.model, status: 'success' });
    llmTokensCounter.inc({ model: this.model, direction: 'input' }, message.usage.input_tokens);
    llmTokensCounter.inc({ model: this.model, direction: 'output' }, message.usage.output_tokens);

    const text = message.content
      .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('\n')
      .trim();

    if (!text) {
      throw new ExtractionFailedError(this.id, 'Empty response from anthropic');
    }

    logger.info('Model memo received', {
      model: message.model,
      request_id: message.id,
      stop_reason: message.stop_reason,
    });

    return {
      ...parseMemoResponse(text),
      model: message.model,
      usage: { input_tokens: message.usage.input_tokens, output_tokens: message.usage.output_tokens },
    };
  }
}
