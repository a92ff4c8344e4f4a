/**
 * Unit Registry - maps frameworks to their task execution units
 */

import type { TaskExecutionUnit } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Registry for task execution units
 *
 * A unit is registered per framework, optionally narrowed to one use case.
 * Resolution prefers the (framework, useCase) unit over the framework-wide one.
 */
export class UnitRegistry {
  private readonly units = new Map<string, TaskExecutionUnit>();
  private readonly useCaseUnits = new Map<string, TaskExecutionUnit>();

  /**
   * Register a unit for its framework
   *
   * @example
   * registry.register(new ProcessUnit('langchain', { command: 'node', args: ['qa.mjs'] }));
   * registry.register(new ProcessUnit('langchain', config), 'rag-docs');
   */
  register(unit: TaskExecutionUnit, useCase?: string): this {
    if (useCase === undefined) {
      this.units.set(unit.framework, unit);
    } else {
      this.useCaseUnits.set(useCaseKey(unit.framework, useCase), unit);
    }
    return this;
  }

  resolve(framework: string, useCase: string): TaskExecutionUnit | undefined {
    return this.useCaseUnits.get(useCaseKey(framework, useCase)) ?? this.units.get(framework);
  }

  /**
   * @throws ConfigurationError if no unit serves the pair
   */
  get(framework: string, useCase: string): TaskExecutionUnit {
    const unit = this.resolve(framework, useCase);
    if (!unit) {
      throw new ConfigurationError(
        `No execution unit registered for framework "${framework}" (use case "${useCase}"). ` +
          `Registered frameworks: ${this.getFrameworks().join(', ') || 'none'}`,
        { code: 'UNIT_NOT_FOUND' }
      );
    }
    return unit;
  }

  has(framework: string, useCase: string): boolean {
    return this.resolve(framework, useCase) !== undefined;
  }

  getFrameworks(): string[] {
    const frameworks = new Set(this.units.keys());
    for (const unit of this.useCaseUnits.values()) {
      frameworks.add(unit.framework);
    }
    return [...frameworks].sort();
  }
}

function useCaseKey(framework: string, useCase: string): string {
  return `${framework}::${useCase}`;
}
