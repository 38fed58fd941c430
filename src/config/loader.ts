/**
 * Configuration Loader
 *
 * Loads the deployment configuration from YAML with environment-specific
 * overrides, then validates it (and applies defaults) with zod.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { zodErrorToGatewayError } from '../api/errors.js';
import { DeploymentConfigSchema } from '../types/schemas/config.js';
import type { DeploymentConfig } from '../types/index.js';

export type ConfigEnvironment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
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

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Parse YAML text and apply the `environments.<env>` override block.
 *
 * The result is not validated yet.
 */
export function parseConfig(contents: string, environment?: ConfigEnvironment): PlainObject {
  const loaded: unknown = yaml.load(contents);
  if (!isPlainObject(loaded)) {
    throw new Error('Configuration must be a YAML mapping');
  }

  const { environments, ...base } = loaded;
  const env = resolveEnvironment(environment);
  const override = isPlainObject(environments) ? environments[env] : undefined;

  return isPlainObject(override) ? deepMerge(base, override) : base;
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): PlainObject {
  const finalPath = configPath ?? defaultConfigPath();

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`
      );
    }
    throw new Error(`Failed to load configuration: ${String(error)}`);
  }

  return parseConfig(fileContents, environment);
}

/**
 * Validate configuration values and fill in defaults
 *
 * @throws {GatewayError} `ValidationError` naming the first offending field
 */
export function validateConfig(config: unknown): DeploymentConfig {
  const parseResult = DeploymentConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw zodErrorToGatewayError(parseResult.error);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: DeploymentConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(
  configPath?: string,
  environment?: ConfigEnvironment
): DeploymentConfig {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): DeploymentConfig {
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
