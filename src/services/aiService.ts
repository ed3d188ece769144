import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions';
import { isSupportedModel } from '../config/models.js';
import { ChatMessage } from '../types/conversation.js';
import { CompletionClient } from '../types/services.js';
import { CompletionError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

// The slice of the SDK the client calls; `openai.chat.completions` satisfies it
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAICompletionOptions {
  apiKey?: string;
  timeoutMs: number;
  maxCompletionTokens: number;
  // Replaces the SDK client built from `apiKey`
  completions?: ChatCompletionsApi;
}

/**
 * Translate anything the OpenAI SDK throws into one of the completion error kinds
 */
export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }

  // Timeout is a subclass of the connection error, so it goes first
  if (error instanceof APIConnectionTimeoutError) {
    return new CompletionError('TransientNetworkError', 'The language model did not respond in time');
  }
  if (error instanceof APIConnectionError) {
    return new CompletionError('TransientNetworkError', 'Could not reach the language model service');
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new CompletionError('AuthError', 'The language model API rejected the configured API key');
    }
    if (status === 429) {
      return new CompletionError('RateLimited', 'The language model API rate limit was reached, try again shortly');
    }
    if (status === 404 || error.code === 'model_not_found') {
      return new CompletionError('UnsupportedModel', 'The requested model is not available');
    }
    if (status !== undefined && status >= 500) {
      return new CompletionError('TransientNetworkError', 'The language model service is temporarily unavailable');
    }
    return new CompletionError('UnknownError', error.message);
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new CompletionError('UnknownError', message);
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAICompletionClient implements CompletionClient {
  private completions: ChatCompletionsApi | null;

  constructor(private options: OpenAICompletionOptions) {
    if (options.completions) {
      this.completions = options.completions;
    } else if (options.apiKey) {
      // No automatic retries: the caller decides whether to try again
      const openai = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
      this.completions = openai.chat.completions;
    } else {
      this.completions = null;
    }
  }

  async complete(messages: ChatMessage[], temperature: number, model: string): Promise<string> {
    if (!isSupportedModel(model)) {
      throw new CompletionError('UnsupportedModel', `Model "${model}" is not supported`);
    }
    if (!this.completions) {
      throw new CompletionError('AuthError', 'OpenAI API key not configured');
    }

    logger.info('[AI] Requesting completion', { model, temperature, messageCount: messages.length });

    let content: string | null | undefined;
    try {
      const completion = await this.completions.create({
        model,
        messages: messages.map(toOpenAIMessage),
        temperature,
        max_tokens: this.options.maxCompletionTokens
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      const mapped = toCompletionError(error);
      logger.error(`[AI] Completion failed (${mapped.kind})`, error);
      throw mapped;
    }

    if (!content || !content.trim()) {
      throw new CompletionError('UnknownError', 'The language model returned an empty response');
    }

    logger.info('[AI] Completion received', {
      responseExcerpt: content.substring(0, 50) + (content.length > 50 ? '...' : '')
    });
    return content;
  }
}
