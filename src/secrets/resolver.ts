import { ConfigError, SecretResolutionError, TaskDefError, errorMessage } from '../errors.js';
import type { ServiceConfig } from '../types/index.js';
import { getComponentLogger } from '../utils/logging.js';
import type { DiscoveredSecret, ResolvedSecret, SecretKeyDiscovery, SecretReference } from './types.js';

/** `valueFrom` for one JSON key of a secret. */
export function keyedLocator(locator: string, key: string): string {
  return `${locator}:${key}::`;
}

function trimmed(value: string | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Turn the `secrets` and `secrets_envs` blocks into an ordered list of references.
 * Classic entries come first, then `secrets_envs` in declaration order.
 */
export function parseSecretReferences(spec: ServiceConfig): SecretReference[] {
  const references: SecretReference[] = [];

  for (const entry of spec.secrets ?? []) {
    for (const [envName, locator] of Object.entries(entry)) {
      references.push({ kind: 'classic', envName, locator });
    }
  }

  (spec.secrets_envs ?? []).forEach((entry, idx) => {
    const id = trimmed(entry.id);
    const name = trimmed(entry.name);
    const values = entry.values ?? [];

    if (entry.auto_parse_keys_to_envs === false) {
      const envName = trimmed(entry.env_name);
      if (!envName) {
        throw new ConfigError(`Invalid secrets_envs[${idx}]: env_name is required when auto_parse_keys_to_envs is false`);
      }
      if (id) {
        references.push({ kind: 'whole-secret', envName, locator: id });
      } else if (name) {
        references.push({ kind: 'whole-secret', envName, secretName: name });
      } else {
        throw new ConfigError(
          `Invalid secrets_envs[${idx}]: either id or name is required when auto_parse_keys_to_envs is false`
        );
      }
      return;
    }

    if (name && !id && values.length === 0) {
      references.push({ kind: 'by-name', secretName: name });
      return;
    }

    if (!id) {
      throw new ConfigError(`Invalid secrets_envs[${idx}]: 'values' requires an 'id' locator`);
    }

    if (values.length === 0) {
      getComponentLogger('secrets').warn({ locator: id }, 'secrets_envs entry has an id but no values, nothing to expose');
      return;
    }

    references.push({ kind: 'by-locator', locator: id, keys: [...values] });
  });

  return references;
}

/**
 * Resolves secret references to container `secrets` entries.
 * Only references by name contact the remote secret store.
 */
export class SecretResolver {
  private readonly logger = getComponentLogger('secrets');

  constructor(private readonly discovery?: SecretKeyDiscovery) {}

  async resolve(references: SecretReference[]): Promise<ResolvedSecret[]> {
    const resolved: ResolvedSecret[] = [];
    const seen = new Set<string>();

    const add = (name: string, valueFrom: string) => {
      if (seen.has(name)) {
        throw new ConfigError(`Duplicate secret environment variable name detected: '${name}'`);
      }
      seen.add(name);
      resolved.push({ name, valueFrom });
    };

    for (const reference of references) {
      switch (reference.kind) {
        case 'classic':
          add(reference.envName, keyedLocator(reference.locator, reference.envName));
          break;
        case 'by-locator':
          for (const key of reference.keys) {
            add(key, keyedLocator(reference.locator, key));
          }
          break;
        case 'by-name': {
          const { arn, keys } = await this.discover(reference.secretName);
          if (keys.length === 0) {
            this.logger.warn({ secretName: reference.secretName }, 'No keys found in secret');
            break;
          }
          const sortedKeys = [...keys].sort();
          for (const key of sortedKeys) {
            add(key, keyedLocator(arn, key));
          }
          this.logger.info(
            { secretName: reference.secretName, arn, keys: sortedKeys },
            `Auto-discovered ${sortedKeys.length} keys from secret`
          );
          break;
        }
        case 'whole-secret':
          add(
            reference.envName,
            reference.locator !== undefined ? reference.locator : await this.resolveArn(reference.secretName)
          );
          break;
      }
    }

    this.logger.info(`Built ${resolved.length} secret configurations`);
    return resolved;
  }

  private requireDiscovery(secretName: string): SecretKeyDiscovery {
    if (!this.discovery) {
      throw new SecretResolutionError(`No secret lookup configured to resolve secret '${secretName}'`, secretName);
    }
    return this.discovery;
  }

  private async discover(secretName: string): Promise<DiscoveredSecret> {
    const discovery = this.requireDiscovery(secretName);
    try {
      return await discovery.discoverKeys(secretName);
    } catch (error) {
      throw this.lookupError('discover keys for', secretName, error);
    }
  }

  private async resolveArn(secretName: string): Promise<string> {
    const discovery = this.requireDiscovery(secretName);
    try {
      return await discovery.resolveArn(secretName);
    } catch (error) {
      throw this.lookupError('resolve ARN for', secretName, error);
    }
  }

  private lookupError(action: string, secretName: string, error: unknown): TaskDefError {
    if (error instanceof SecretResolutionError) {
      return error;
    }
    return new SecretResolutionError(`Failed to ${action} secret '${secretName}': ${errorMessage(error)}`, secretName, {
      cause: error
    });
  }
}

/**
 * Parse and resolve the secrets of a service in one step
 */
export async function resolveServiceSecrets(
  spec: ServiceConfig,
  discovery?: SecretKeyDiscovery
): Promise<ResolvedSecret[]> {
  return new SecretResolver(discovery).resolve(parseSecretReferences(spec));
}
