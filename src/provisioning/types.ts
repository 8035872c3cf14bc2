// Provisioning-specific types

/** AWS SDK client settings shared by every AWS-backed implementation. */
export interface AwsClientOptions {
  region: string;
  maxAttempts?: number;
  retryMode?: 'standard' | 'adaptive';
}

/** A persisted autoscaling record, one per `{environment}:{cluster}:{service}`. */
export interface AutoscalingRecord {
  service_key: string;
  env: string;
  /** Incremented on every accepted write. */
  version: number;
  config: Record<string, unknown>;
  checksum: string;
  commit_sha: string;
  /** Epoch seconds. */
  updated_at: number;
}

export type AutoscalingRecordInput = Omit<AutoscalingRecord, 'version'>;

export type ConditionalWriteResult =
  | { written: true; record: AutoscalingRecord; previousChecksum?: string }
  | { written: false; reason: 'stale' };

/**
 * Storage for autoscaling records. `putIfNotNewer` must be a single conditional write:
 * it succeeds only when no record exists or the stored `updated_at` is not newer.
 */
export interface AutoscalingStore {
  readonly tableName: string;
  tableExists(): Promise<boolean>;
  putIfNotNewer(record: AutoscalingRecordInput): Promise<ConditionalWriteResult>;
}
