/**
 * Handler Function Registry
 * @module providers/function-registry
 *
 * Named custom handlers and name generators. Provider definitions refer to
 * functions by name; every name is checked here when a definition is
 * loaded, never when a handler runs.
 */

import type { NameGenerator } from '../transformers/types';
import { awsCustomHandlers, awsNameGenerators } from './aws/handlers';
import { azureCustomHandlers } from './azure/handlers';
import { gcpCustomHandlers, gcpNameGenerators } from './gcp/handlers';
import type { CustomHandler } from './types';

export class FunctionRegistry {
  private readonly handlers = new Map<string, CustomHandler>();
  private readonly nameGenerators = new Map<string, NameGenerator>();

  registerHandler(name: string, handler: CustomHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  registerHandlers(handlers: Readonly<Record<string, CustomHandler>>): this {
    for (const [name, handler] of Object.entries(handlers)) {
      this.registerHandler(name, handler);
    }
    return this;
  }

  registerNameGenerator(name: string, generator: NameGenerator): this {
    this.nameGenerators.set(name, generator);
    return this;
  }

  registerNameGenerators(generators: Readonly<Record<string, NameGenerator>>): this {
    for (const [name, generator] of Object.entries(generators)) {
      this.registerNameGenerator(name, generator);
    }
    return this;
  }

  getHandler(name: string): CustomHandler | undefined {
    return this.handlers.get(name);
  }

  getNameGenerator(name: string): NameGenerator | undefined {
    return this.nameGenerators.get(name);
  }

  handlerNames(): string[] {
    return [...this.handlers.keys()];
  }

  nameGeneratorNames(): string[] {
    return [...this.nameGenerators.keys()];
  }
}

/**
 * Registry holding every shipped provider function
 */
export function createDefaultFunctionRegistry(): FunctionRegistry {
  return new FunctionRegistry()
    .registerHandlers(awsCustomHandlers)
    .registerHandlers(gcpCustomHandlers)
    .registerHandlers(azureCustomHandlers)
    .registerNameGenerators(awsNameGenerators)
    .registerNameGenerators(gcpNameGenerators);
}
