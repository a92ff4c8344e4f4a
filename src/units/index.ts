/**
 * Units module exports
 */

export { UnitRegistry } from './registry.js';
export { ProcessUnit, EXIT_TRANSIENT, EXIT_VALIDATION } from './process.js';
export {
  OpenAIChatUnit,
  type ChatCompletionsClient,
  type ChatCompletionResponse,
} from './openai-chat.js';
export {
  AnthropicMessagesUnit,
  type MessagesClient,
  type MessageResponse,
} from './anthropic-messages.js';
export { convertSDKError } from './error-converter.js';
export { buildUserMessage, defaultSystemPrompt } from './prompt.js';
export { parseUnitConfig, type ModelUnitOptions } from './types.js';
export { createUnitFromConfig, registerFrameworks } from './factory.js';
