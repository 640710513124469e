/**
 * Model Registry
 *
 * Startup-time registry mapping a model type name to its implementation.
 * The instance cache consults it for every operation; a name that is not
 * registered is a validation error, not a lookup miss.
 */

import type { ModelType, ModelTypeInfo } from '../types/models.js';
import { AlreadyExistsError, ValidationError } from '../utils/errors.js';

export class ModelRegistry {
  private readonly types = new Map<string, ModelType>();

  constructor(types: Iterable<ModelType> = []) {
    for (const type of types) {
      this.register(type);
    }
  }

  /**
   * @throws {AlreadyExistsError} if a type with the same name is registered
   */
  register(type: ModelType): this {
    if (this.types.has(type.name)) {
      throw new AlreadyExistsError(`Model type "${type.name}" is already registered`);
    }
    this.types.set(type.name, type);
    return this;
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  /**
   * @throws {ValidationError} for an unknown model type
   */
  get(name: string): ModelType {
    const type = this.types.get(name);
    if (!type) {
      throw new ValidationError(`Unknown model type "${name}"`, [
        { path: 'modelType', message: `expected one of: ${[...this.types.keys()].join(', ') || '(none)'}` },
      ]);
    }
    return type;
  }

  list(): ModelTypeInfo[] {
    return [...this.types.values()].map((type) => ({
      name: type.name,
      ...(type.description !== undefined && { description: type.description }),
    }));
  }
}
