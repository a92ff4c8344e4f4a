/**
 * Unit Factory - builds execution units from benchmark file configuration
 */

import type { TaskExecutionUnit } from '../types/index.js';
import type { FrameworkConfig, UnitConfig } from '../types/schemas.js';
import { createLogger } from '../utils/logger.js';
import { AnthropicMessagesUnit } from './anthropic-messages.js';
import { OpenAIChatUnit } from './openai-chat.js';
import { ProcessUnit } from './process.js';
import type { UnitRegistry } from './registry.js';

const logger = createLogger('UnitFactory');

export function createUnitFromConfig(framework: string, config: UnitConfig): TaskExecutionUnit {
  switch (config.type) {
    case 'process':
      return new ProcessUnit(framework, config);
    case 'openai':
      return new OpenAIChatUnit(framework, config);
    case 'anthropic':
      return new AnthropicMessagesUnit(framework, config);
  }
}

/**
 * Register every framework of a benchmark file, including its use-case overrides
 *
 * @returns Number of units registered
 */
export function registerFrameworks(
  registry: UnitRegistry,
  frameworks: Record<string, FrameworkConfig>
): number {
  let count = 0;
  for (const [framework, config] of Object.entries(frameworks)) {
    registry.register(createUnitFromConfig(framework, config.unit));
    count++;

    for (const [useCase, unitConfig] of Object.entries(config.useCases ?? {})) {
      registry.register(createUnitFromConfig(framework, unitConfig), useCase);
      count++;
    }
    logger.debug({ framework, type: config.unit.type }, 'Framework registered');
  }
  return count;
}
