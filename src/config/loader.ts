// Service document loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import type { LoadedService, ServiceConfig } from '../types/index.js';
import { getComponentLogger } from '../utils/logging.js';
import { isPlainObject, resolveServiceDocument, type RawDocument } from './merge.js';
import type { ConfigLoader, ConfigValidationResult } from './types.js';
import { KNOWN_SERVICE_KEYS, validateAndNormalizeServiceConfig, validateServiceConfig } from './validator.js';

const DEFAULT_APP_NAME = 'app';

/**
 * Loads a service description (YAML or JSON), substitutes environment variables,
 * applies the `services_overrides` entry for the selector and validates the result.
 */
export class ServiceConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load the configuration of one service or task
   * @param path - Path to the configuration file
   * @param selector - Service or task name; picks an override entry
   */
  async load(path: string, selector?: string): Promise<LoadedService> {
    const document = await this.readDocument(path);
    const logger = getComponentLogger('config-loader');

    const resolved = this.dropNullKeys(resolveServiceDocument(document, selector));
    const unknownKeys = Object.keys(resolved).filter(key => !KNOWN_SERVICE_KEYS.includes(key));
    if (unknownKeys.length > 0) {
      logger.warn({ keys: unknownKeys }, 'Ignoring unknown configuration keys');
    }

    const spec = this.normalize(path, resolved);

    const appName = selector || spec.name || DEFAULT_APP_NAME;
    logger.debug({ path, appName, launchType: spec.launch_type }, 'Loaded service configuration');

    return { spec, appName, ...(selector ? { selector } : {}) };
  }

  /**
   * Validate a resolved document without touching the filesystem
   */
  validate(config: unknown): ConfigValidationResult<unknown> {
    return validateServiceConfig(config);
  }

  /**
   * Read, parse and environment-substitute a document, before any override merging
   */
  async readDocument(path: string): Promise<RawDocument> {
    if (!existsSync(path)) {
      throw new ConfigError(`Configuration file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');
    const raw = this.parse(path, content);

    if (raw === null || raw === undefined) {
      throw new ConfigError(`Configuration file is empty: ${path}`);
    }
    if (!isPlainObject(raw)) {
      throw new ConfigError(`Configuration file must contain a mapping at the top level: ${path}`);
    }

    const substituted = this.resolveEnvironmentVariables(raw);
    if (!isPlainObject(substituted)) {
      throw new ConfigError(`Configuration file must contain a mapping at the top level: ${path}`);
    }
    return substituted;
  }

  private normalize(path: string, resolved: RawDocument): ServiceConfig {
    try {
      return validateAndNormalizeServiceConfig(resolved);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(`Invalid configuration in ${path}`, error.details, { cause: error });
      }
      throw error;
    }
  }

  private parse(path: string, content: string): unknown {
    const extension = extname(path).toLowerCase();
    try {
      switch (extension) {
        case '.json':
          return JSON.parse(content);
        case '.yml':
        case '.yaml':
          return parseYaml(content);
        default:
          throw new ConfigError('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(`Failed to parse ${path}: ${errorMessage(error)}`, [], { cause: error });
    }
  }

  /**
   * Top-level keys holding null mean "unset"
   */
  private dropNullKeys(document: RawDocument): RawDocument {
    return Object.fromEntries(Object.entries(document).filter(([, value]) => value !== null));
  }

  /**
   * Recursively resolve environment variables in every string value.
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: RawDocument = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, expression: string) => {
      const separator = expression.indexOf(':-');
      const varName = separator === -1 ? expression : expression.slice(0, separator);
      const defaultValue = separator === -1 ? undefined : expression.slice(separator + 2);
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset without default: keep the placeholder
      return match;
    });
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env?: NodeJS.ProcessEnv): ServiceConfigLoader {
  return new ServiceConfigLoader(env);
}

/**
 * Load and validate the configuration of one service
 */
export async function loadServiceConfig(path: string, selector?: string): Promise<LoadedService> {
  return createConfigLoader().load(path, selector);
}
