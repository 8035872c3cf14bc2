import { createHash } from 'crypto';

/** Schema version stamped into every published policy. */
export const POLICY_SCHEMA_VERSION = 1;

/**
 * Compact JSON with object keys sorted at every depth.
 * Array order is significant and kept.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function withSchemaVersion(policy: object): Record<string, unknown> {
  return { ...Object.fromEntries(Object.entries(policy)), version: POLICY_SCHEMA_VERSION };
}

/** SHA-256 hex digest of the canonical JSON of the policy plus its schema version. */
export function computeChecksum(policy: object): string {
  return createHash('sha256').update(canonicalJson(withSchemaVersion(policy)), 'utf8').digest('hex');
}

export function buildServiceKey(environment: string, cluster: string, service: string): string {
  return `${environment}:${cluster}:${service}`;
}

export function autoscalingTableName(cluster: string): string {
  return `${cluster}_ecs_autoscaling_config`;
}
