/**
 * Claude Client Service
 *
 * Thin wrapper over the Anthropic Messages API used by the arbitration
 * provider:
 * - Optional retry loop with exponential backoff
 * - SDK failures mapped to ArbitrationError
 * - Usage accounting
 */

import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config';
import { ArbitrationError } from '../errors';
import logger from '../utils/logger';

const PROVIDER_NAME = 'claude';

export interface ClaudeClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  /** Total attempts, 1 means no retry */
  retryAttempts?: number;
}

export interface ClaudeRequestOptions {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

export interface ClaudeResponse {
  content: string;
  stopReason: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ClaudeUsageStats {
  requestCount: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  estimatedCost: number;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  if (readCode(error) === 'ETIMEDOUT') return true;
  return error instanceof Error && /timed? ?out/i.test(error.message);
}

export class ClaudeClientService {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private requestCount = 0;
  private totalInputTokens = 0;
  private totalOutputTokens = 0;

  constructor(options: ClaudeClientOptions) {
    this.model = options.model ?? config.ai.model;
    this.maxTokens = options.maxTokens ?? config.ai.maxTokens;
    this.temperature = options.temperature ?? config.ai.temperature;
    this.timeoutMs = options.timeoutMs ?? config.ai.timeoutMs;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? config.ai.retryAttempts);

    // Retries are handled here so they can be logged and counted
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });

    logger.info('ClaudeClientService initialized', {
      model: this.model,
      retryAttempts: this.retryAttempts,
    });
  }

  get modelName(): string {
    return this.model;
  }

  /**
   * Send a single-turn prompt to Claude.
   * @throws ArbitrationError once every attempt has failed
   */
  async sendMessage(prompt: string, options: ClaudeRequestOptions = {}): Promise<ClaudeResponse> {
    const maxTokens = options.maxTokens ?? this.maxTokens;
    const temperature = options.temperature ?? this.temperature;

    for (let attempt = 1; ; attempt++) {
      try {
        logger.debug('Sending request to Claude', {
          model: this.model,
          attempt,
          maxAttempts: this.retryAttempts,
        });

        const startTime = Date.now();

        const response = await this.client.messages.create({
          model: this.model,
          max_tokens: maxTokens,
          temperature,
          system: options.systemPrompt,
          messages: [{ role: 'user', content: prompt }],
        });

        const duration = Date.now() - startTime;

        this.requestCount++;
        this.totalInputTokens += response.usage.input_tokens;
        this.totalOutputTokens += response.usage.output_tokens;

        logger.info('Claude request successful', {
          model: this.model,
          duration,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          stopReason: response.stop_reason,
          totalRequests: this.requestCount,
        });

        const content = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .filter(Boolean)
          .join('\n');

        return {
          content,
          stopReason: response.stop_reason ?? 'unknown',
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          },
        };
      } catch (error) {
        const failure = this.toArbitrationError(error);

        logger.warn('Claude request failed', {
          attempt,
          maxAttempts: this.retryAttempts,
          error: failure.message,
          code: failure.code,
          isRetryable: failure.isRetryable,
        });

        if (!failure.isRetryable || attempt >= this.retryAttempts) {
          throw failure;
        }

        const delayMs = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
        logger.debug('Retrying after delay', { delayMs, attempt });
        await this.delay(delayMs);
      }
    }
  }

  getUsageStats(): ClaudeUsageStats {
    return {
      requestCount: this.requestCount,
      totalInputTokens: this.totalInputTokens,
      totalOutputTokens: this.totalOutputTokens,
      estimatedCost: this.calculateCost(),
    };
  }

  resetUsageStats(): void {
    this.requestCount = 0;
    this.totalInputTokens = 0;
    this.totalOutputTokens = 0;
  }

  /**
   * Estimated cost at Claude 3.5 Sonnet list prices
   */
  private calculateCost(): number {
    const inputCostPer1M = 3.0;
    const outputCostPer1M = 15.0;

    const inputCost = (this.totalInputTokens / 1_000_000) * inputCostPer1M;
    const outputCost = (this.totalOutputTokens / 1_000_000) * outputCostPer1M;

    return inputCost + outputCost;
  }

  private toArbitrationError(error: unknown): ArbitrationError {
    if (error instanceof ArbitrationError) return error;

    const status = readStatus(error);
    if (status === 429) {
      return ArbitrationError.rateLimited(PROVIDER_NAME);
    }
    if (isTimeout(error)) {
      return ArbitrationError.timeout(PROVIDER_NAME, this.timeoutMs);
    }

    const cause = error instanceof Error ? error : undefined;
    const failure = ArbitrationError.requestFailed(
      PROVIDER_NAME,
      cause?.message ?? String(error),
      cause
    );

    // Rate limits, server errors and dropped connections are worth another try
    const retryable =
      status === 500 || status === 503 || status === 529 || readCode(error) === 'ECONNRESET';
    return retryable
      ? failure
      : new ArbitrationError(failure.message, failure.code, PROVIDER_NAME, { cause, status }, false);
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
