/**
 * Main type exports
 */

export * from './models.js';
export * from './tasks.js';
export type { ModelsConfig, ModelsConfigInput, LogLevel } from './schemas/config.js';
