import { ModelRegistry } from '../core/model-registry.js';
import { demoModel } from './demo-model.js';
import { linearModel } from './linear-model.js';

export { demoModel, type DemoModelState } from './demo-model.js';
export { linearModel, type LinearModelState } from './linear-model.js';

/**
 * Registry with the built-in model types
 */
export function createDefaultRegistry(): ModelRegistry {
  return new ModelRegistry([demoModel, linearModel]);
}
