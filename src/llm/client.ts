import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { AppConfig } from '../config';
import { ServiceError, describeError, isTransientServiceError } from '../errors';
import { GenerationCapability } from '../types';
import { exponentialBackoff, BackoffOptions } from '../util/retry';

type CompletionLike = {
  choices: Array<{ message?: { content?: string | null } }>;
};

/**
 * The slice of `openai.chat.completions` the client calls.
 */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<CompletionLike>;
}

export type GenerationClientOptions = {
  completions: ChatCompletionsApi;
  model: string;
  temperature?: number;
  maxAttempts?: number;
  backoff?: Omit<BackoffOptions, 'maxAttempts' | 'shouldRetry' | 'onRetry'>;
};

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export const toServiceError = (error: unknown): ServiceError => {
  if (error instanceof ServiceError) {
    return error;
  }

  // Connection failures and timeouts carry no status.
  if (error instanceof OpenAI.APIConnectionError) {
    return new ServiceError('transient', `LLM service unreachable: ${error.message}`, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const { status } = error;
    const transient = status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500;

    return new ServiceError(
      transient ? 'transient' : 'permanent',
      `LLM API error${status === undefined ? '' : ` (${status})`}: ${error.message}`,
      { status, cause: error },
    );
  }

  return new ServiceError('transient', `LLM call failed: ${describeError(error)}`, { cause: error });
};

export class OpenAiGenerationClient implements GenerationCapability {
  private readonly completions: ChatCompletionsApi;

  private readonly model: string;

  private readonly temperature: number;

  private readonly maxAttempts: number;

  private readonly backoff: GenerationClientOptions['backoff'];

  constructor(options: GenerationClientOptions) {
    this.completions = options.completions;
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoff = options.backoff;
  }

  private async complete(messages: ChatCompletionMessageParam[]): Promise<string> {
    let response: CompletionLike;

    try {
      response = await this.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages,
      });
    } catch (error) {
      throw toServiceError(error);
    }

    const content = response.choices[0]?.message?.content?.trim();

    if (!content) {
      throw new ServiceError('transient', 'LLM response did not contain any content.');
    }

    return content;
  }

  async generate(prompt: string, instructions?: string): Promise<string> {
    const messages: ChatCompletionMessageParam[] = instructions
      ? [
        { role: 'system', content: instructions },
        { role: 'user', content: prompt },
      ]
      : [{ role: 'user', content: prompt }];

    return exponentialBackoff(() => this.complete(messages), {
      ...this.backoff,
      maxAttempts: this.maxAttempts,
      shouldRetry: (error) => isTransientServiceError(error),
      onRetry: (error, attempt, delayMs) => {
        console.warn(`Retrying LLM call after attempt ${attempt} in ${delayMs}ms: ${describeError(error)}`);
      },
    });
  }
}

export const createGenerationClient = (config: AppConfig): OpenAiGenerationClient => {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    // Retries happen in generate() so they follow the transient/permanent split.
    maxRetries: 0,
  });

  return new OpenAiGenerationClient({
    completions: client.chat.completions,
    model: config.model,
    temperature: config.temperature,
    maxAttempts: config.maxAttempts,
  });
};
