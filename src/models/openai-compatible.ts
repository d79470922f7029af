/**
 * OpenAI-compatible chat completions client
 *
 * Talks to any endpoint that speaks the `/chat/completions` protocol with
 * `response_format: json_schema`, and turns the reply into a validated
 * structured object.
 */

import { z } from 'zod';
import type { IModel, ChatCompletionOptions, ModelResponse, Message } from './base.js';
import type { OutputContract, StructuredModel } from './structured.js';
import { ModelError, SchemaValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface OpenAICompatibleConfig {
  endpoint: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  /** Base of the exponential backoff between retries, in ms. */
  retryDelayMs?: number;
}

const CompletionBodySchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class OpenAICompatibleModel implements IModel, StructuredModel {
  private config: OpenAICompatibleConfig;

  constructor(config: OpenAICompatibleConfig) {
    this.config = config;
  }

  async query<S extends z.ZodTypeAny>(
    messages: readonly Message[],
    contract: OutputContract<S>
  ): Promise<z.infer<S>> {
    const response = await this.chat({
      messages,
      responseFormat: {
        type: 'json_schema',
        json_schema: {
          name: contract.name,
          schema: contract.jsonSchema(),
        },
      },
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.content);
    } catch (error) {
      throw new SchemaValidationError(
        `Model output for ${contract.name} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        contract.name
      );
    }

    return contract.parse(parsed);
  }

  async chat(options: ChatCompletionOptions): Promise<ModelResponse> {
    // Retry only rate limiting / WAF rejections
    const maxRetries = this.config.maxRetries ?? 2;
    const baseDelay = this.config.retryDelayMs ?? 1000;

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        const waitTime = Math.pow(2, attempt) * baseDelay;
        logger.warn(`Retrying after ${waitTime}ms (attempt ${attempt + 1}/${maxRetries + 1})...`);
        await new Promise((resolve) => setTimeout(resolve, waitTime));
      }

      try {
        return await this.attemptChat(options);
      } catch (error) {
        if (
          !(error instanceof ModelError) ||
          (error.status !== 403 && error.status !== 429) ||
          attempt >= maxRetries
        ) {
          throw error;
        }
        logger.warn(`Got ${error.status === 403 ? '403 Access Denied' : '429 Rate Limited'}, will retry...`);
      }
    }
  }

  private async attemptChat(options: ChatCompletionOptions): Promise<ModelResponse> {
    const requestBody: Record<string, unknown> = {
      model: options.model || this.config.model,
      messages: options.messages,
    };

    const temperature = options.temperature ?? this.config.temperature;
    if (temperature !== undefined) {
      requestBody.temperature = temperature;
    }

    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    if (maxTokens) {
      requestBody.max_tokens = maxTokens;
    }

    if (options.responseFormat) {
      requestBody.response_format = options.responseFormat;
    }

    logger.debug(`Model request: ${options.messages.length} message(s) to ${this.config.model}`);

    let response: Response;
    try {
      response = await fetch(this.config.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
          'Accept': 'application/json',
        },
        body: JSON.stringify(requestBody),
      });
    } catch (error) {
      throw new ModelError(
        `Failed to communicate with model endpoint: ${error instanceof Error ? error.message : String(error)}`,
        this.config.model
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      logger.debug(`Model API error response (${response.status}): ${errorText}`);

      throw new ModelError(
        `Model API error (${response.status}): ${errorText}`,
        this.config.model,
        response.status
      );
    }

    const body = CompletionBodySchema.safeParse(await response.json());
    if (!body.success) {
      throw new ModelError('Unexpected completion response shape', this.config.model);
    }

    const choice = body.data.choices?.[0];
    if (!choice) {
      throw new ModelError('No choices in response', this.config.model);
    }

    const usage = body.data.usage;
    return {
      content: choice.message.content ?? '',
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens ?? 0,
            completionTokens: usage.completion_tokens ?? 0,
            totalTokens: usage.total_tokens ?? 0,
          }
        : undefined,
    };
  }
}

/**
 * Factory function to create model instances
 */
export function createOpenAICompatibleModel(config: OpenAICompatibleConfig): OpenAICompatibleModel {
  return new OpenAICompatibleModel(config);
}
