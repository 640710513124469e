/**
 * Configuration Loader
 *
 * Loads config/models.yaml, interpolates ${ENV_VAR} references, applies the
 * environment-specific override block and the MODELS_* environment
 * variables, then validates everything with the zod schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ModelsConfigSchema, type ModelsConfig } from '../types/schemas/config.js';
import { ConfigurationError, fromZodError, hasErrorCode, toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

const logger = createLogger('ConfigLoader');

/**
 * Environment variables that override a config key
 */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; path: [string, string] }> = [
  { variable: 'MODELS_FOLDER', path: ['models', 'folder'] },
  { variable: 'MODELS_BROKER_URL', path: ['broker', 'url'] },
  { variable: 'MODELS_BACKEND_URL', path: ['backend', 'url'] },
  { variable: 'MODELS_DATABASE_URL', path: ['database', 'url'] },
  { variable: 'MODELS_LOG_LEVEL', path: ['logging', 'level'] },
];

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Interpolate environment variables in string
 *
 * Replaces ${VAR_NAME} with process.env.VAR_NAME
 */
function interpolateEnvVars(content: string): string {
  return content.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      logger.warn({ variable: varName }, 'Environment variable not found');
      return '';
    }
    return value;
  });
}

function applyEnvOverrides(config: PlainObject): PlainObject {
  let output = config;
  for (const { variable, path } of ENV_OVERRIDES) {
    const value = process.env[variable];
    if (value !== undefined && value !== '') {
      output = deepMerge(output, { [path[0]]: { [path[1]]: value } });
    }
  }
  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function getDefaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'models.yaml');
}

function readConfigFile(path: string, required: boolean): PlainObject {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') && !required) {
      logger.debug({ path }, 'No configuration file, using defaults');
      return {};
    }
    throw new ConfigurationError(
      `Failed to read configuration from ${path}: ${toError(error).message}`,
      toError(error)
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(interpolateEnvVars(contents));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration ${path}: ${toError(error).message}`,
      toError(error)
    );
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Configuration ${path} must be a mapping at the top level`);
  }
  return parsed;
}

/**
 * Validate a raw configuration object and fill in defaults
 *
 * @throws {ValidationError} if any value is out of range
 */
export function validateConfig(raw: unknown): ModelsConfig {
  const result = ModelsConfigSchema.safeParse(raw);
  if (!result.success) {
    throw fromZodError(result.error, 'Configuration validation failed');
  }
  return result.data;
}

/**
 * Load configuration from YAML file
 *
 * When `configPath` is omitted the package's config/models.yaml is used if
 * present; an explicit path must exist.
 *
 * @example
 * ```typescript
 * const config = loadConfig('config/models.yaml', 'production');
 * console.log(config.broker.url);
 * ```
 */
export function loadConfig(configPath?: string, environment?: Environment): ModelsConfig {
  const finalPath = configPath ?? getDefaultConfigPath();
  const fileConfig = readConfigFile(finalPath, configPath !== undefined);

  const { environments, ...baseConfig } = fileConfig;
  const env = environment ?? process.env.NODE_ENV ?? 'development';

  let merged: PlainObject = baseConfig;
  if (isPlainObject(environments)) {
    const envConfig = environments[env];
    if (isPlainObject(envConfig)) {
      merged = deepMerge(baseConfig, envConfig);
    }
  }

  const config = validateConfig(applyEnvOverrides(merged));
  logger.debug({ path: finalPath, env }, 'Configuration loaded');
  return config;
}

/**
 * Global configuration instance
 */
let globalConfig: ModelsConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): ModelsConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): ModelsConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}
