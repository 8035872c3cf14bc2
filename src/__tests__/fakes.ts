import type {
  AutoscalingRecord,
  AutoscalingRecordInput,
  AutoscalingStore,
  ConditionalWriteResult
} from '../provisioning/types.js';
import type { DiscoveredSecret, SecretKeyDiscovery } from '../secrets/types.js';
import type { ServiceConfig } from '../types/index.js';

export const TEST_ROLE_ARN = 'arn:aws:iam::123456789012:role/test-task-role';

/** A resolved Fargate service document with every default applied. */
export function serviceConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    cpu: 256,
    memory: 512,
    cpu_arch: 'X86_64',
    launch_type: 'FARGATE',
    network_mode: 'awsvpc',
    role_arn: TEST_ROLE_ARN,
    app_protocol: 'http',
    secrets_files_path: '/etc/secrets',
    ...overrides
  };
}

export function secretArn(name: string): string {
  return `arn:aws:secretsmanager:us-east-1:123456789012:secret:${name}-AbCdEf`;
}

/**
 * In-memory secret store: secret name to JSON object (or raw string)
 */
export class FakeSecretKeyDiscovery implements SecretKeyDiscovery {
  readonly calls: string[] = [];

  constructor(private readonly secrets: Record<string, Record<string, string> | string>) {}

  async discoverKeys(secretName: string): Promise<DiscoveredSecret> {
    this.calls.push(secretName);
    const value = this.secrets[secretName];
    if (value === undefined) {
      throw new Error(`Secrets Manager can't find the specified secret: ${secretName}`);
    }
    if (typeof value === 'string') {
      throw new Error(`Secret '${secretName}' does not contain a JSON object`);
    }
    return { arn: secretArn(secretName), keys: Object.keys(value) };
  }

  async resolveArn(secretName: string): Promise<string> {
    this.calls.push(secretName);
    if (this.secrets[secretName] === undefined) {
      throw new Error(`Secrets Manager can't find the specified secret: ${secretName}`);
    }
    return secretArn(secretName);
  }
}

/**
 * In-memory autoscaling table applying the same condition as the DynamoDB store
 */
export class InMemoryAutoscalingStore implements AutoscalingStore {
  readonly records = new Map<string, AutoscalingRecord>();
  exists = true;
  failWith?: Error;

  constructor(readonly tableName = 'test-cluster_ecs_autoscaling_config') {}

  async tableExists(): Promise<boolean> {
    return this.exists;
  }

  async putIfNotNewer(record: AutoscalingRecordInput): Promise<ConditionalWriteResult> {
    if (this.failWith) {
      throw this.failWith;
    }
    const previous = this.records.get(record.service_key);
    if (previous && previous.updated_at > record.updated_at) {
      return { written: false, reason: 'stale' };
    }
    const written: AutoscalingRecord = { ...record, version: (previous?.version ?? 0) + 1 };
    this.records.set(record.service_key, written);
    return previous
      ? { written: true, record: written, previousChecksum: previous.checksum }
      : { written: true, record: written };
  }
}
