/**
 * Anthropic Messages Unit - a "direct model" baseline over the Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type {
  TaskExecutionResult,
  TaskExecutionUnit,
  TaskInput,
  UsageEvent,
} from '../types/index.js';
import { AnthropicUnitConfigSchema, type AnthropicUnitConfig } from '../types/schemas.js';
import { createLogger } from '../utils/logger.js';
import { getEnvOrThrow } from '../utils/env.js';
import { convertSDKError } from './error-converter.js';
import { buildUserMessage, defaultSystemPrompt } from './prompt.js';
import { parseUnitConfig, type ModelUnitOptions } from './types.js';

const logger = createLogger('AnthropicMessagesUnit');

/**
 * The fields of a message this unit reads
 */
export interface MessageResponse {
  id: string;
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic client this unit calls
 */
export interface MessagesClient {
  messages: {
    create(
      body: MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<MessageResponse>;
  };
}

export class AnthropicMessagesUnit implements TaskExecutionUnit {
  private readonly config: AnthropicUnitConfig;
  private readonly client: MessagesClient;

  constructor(
    readonly framework: string,
    config: Omit<Partial<AnthropicUnitConfig>, 'type'> & { model: string },
    options: ModelUnitOptions<MessagesClient> = {}
  ) {
    this.config = parseUnitConfig(
      AnthropicUnitConfigSchema,
      { ...config, type: 'anthropic' },
      framework
    );
    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey ?? getEnvOrThrow(this.config.apiKeyEnv, 'Anthropic API key'),
        maxRetries: 0,
      });
  }

  async execute(input: TaskInput, signal: AbortSignal): Promise<TaskExecutionResult> {
    let response: MessageResponse;
    try {
      response = await this.client.messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          system: this.config.systemPrompt ?? defaultSystemPrompt(input),
          messages: [{ role: 'user', content: buildUserMessage(input) }],
          temperature: this.config.temperature,
        },
        { signal }
      );
    } catch (error) {
      if (signal.aborted) {
        throw signal.reason;
      }
      throw convertSDKError(error, 'anthropic');
    }

    const usageEvents: UsageEvent[] = [
      {
        provider: 'anthropic',
        model: this.config.model,
        inputUnits: response.usage.input_tokens,
        outputUnits: response.usage.output_tokens,
        timestamp: new Date(),
        requestId: response.id,
      },
    ];

    const text = response.content
      .map((block) => (block.type === 'text' ? (block.text ?? '') : ''))
      .join('');

    logger.debug(
      {
        framework: this.framework,
        model: this.config.model,
        sampleId: input.sample.id,
        stopReason: response.stop_reason,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      'Message received'
    );

    if (text.trim().length === 0) {
      return {
        status: 'error',
        errorKind: 'validation',
        message: `Empty message from ${this.config.model}`,
        usageEvents,
      };
    }
    return { status: 'ok', output: text, usageEvents };
  }
}
