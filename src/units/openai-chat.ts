/**
 * OpenAI Chat Unit - a "direct model" baseline over the Chat Completions API
 *
 * Also serves OpenAI-compatible endpoints through `baseURL`; usage events then
 * carry the configured `provider` name so the rate card can price them.
 */

import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type {
  TaskExecutionResult,
  TaskExecutionUnit,
  TaskInput,
  UsageEvent,
} from '../types/index.js';
import { OpenAIUnitConfigSchema, type OpenAIUnitConfig } from '../types/schemas.js';
import { createLogger } from '../utils/logger.js';
import { getEnvOrThrow } from '../utils/env.js';
import { convertSDKError } from './error-converter.js';
import { buildUserMessage, defaultSystemPrompt } from './prompt.js';
import { parseUnitConfig, type ModelUnitOptions } from './types.js';

const logger = createLogger('OpenAIChatUnit');

/**
 * The fields of a chat completion this unit reads
 */
export interface ChatCompletionResponse {
  id: string;
  choices: Array<{ message: { content: string | null }; finish_reason: string | null }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

/**
 * The slice of the OpenAI client this unit calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): PromiseLike<ChatCompletionResponse>;
    };
  };
}

export class OpenAIChatUnit implements TaskExecutionUnit {
  private readonly config: OpenAIUnitConfig;
  private readonly client: ChatCompletionsClient;

  constructor(
    readonly framework: string,
    config: Omit<Partial<OpenAIUnitConfig>, 'type'> & { model: string },
    options: ModelUnitOptions<ChatCompletionsClient> = {}
  ) {
    this.config = parseUnitConfig(OpenAIUnitConfigSchema, { ...config, type: 'openai' }, framework);
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? getEnvOrThrow(this.config.apiKeyEnv, 'OpenAI API key'),
        baseURL: this.config.baseURL,
        maxRetries: 0,
      });
  }

  async execute(input: TaskInput, signal: AbortSignal): Promise<TaskExecutionResult> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: this.config.systemPrompt ?? defaultSystemPrompt(input) },
      { role: 'user', content: buildUserMessage(input) },
    ];

    let response: ChatCompletionResponse;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal }
      );
    } catch (error) {
      if (signal.aborted) {
        throw signal.reason;
      }
      throw convertSDKError(error, 'openai');
    }

    const usageEvents: UsageEvent[] = response.usage
      ? [
          {
            provider: this.config.provider,
            model: this.config.model,
            inputUnits: response.usage.prompt_tokens,
            outputUnits: response.usage.completion_tokens,
            timestamp: new Date(),
            requestId: response.id,
          },
        ]
      : [];

    const choice = response.choices[0];
    const text = choice?.message.content ?? '';
    logger.debug(
      {
        framework: this.framework,
        model: this.config.model,
        sampleId: input.sample.id,
        finishReason: choice?.finish_reason,
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
      },
      'Chat completion received'
    );

    if (text.trim().length === 0) {
      return {
        status: 'error',
        errorKind: 'validation',
        message: `Empty completion from ${this.config.model}`,
        usageEvents,
      };
    }
    return { status: 'ok', output: text, usageEvents };
  }
}
