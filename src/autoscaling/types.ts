// Autoscaling policy types

export type ProviderType = 'sqs' | 'time' | 'sqs+time' | 'cloudwatch';

export const PROVIDER_TYPES: readonly ProviderType[] = ['sqs', 'time', 'sqs+time', 'cloudwatch'];

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun';

export interface SqsProviderConfig {
  queue_url: string;
  target_backlog_per_task?: number;
}

export interface TimeRule {
  days: Weekday[];
  /** `HH:MM`, inclusive. */
  start?: string;
  /** `HH:MM`, exclusive. */
  end?: string;
  min_desired?: number;
  desired?: number;
}

export interface TimeProviderConfig {
  timezone?: string;
  mode?: 'floor' | 'override';
  rules: TimeRule[];
}

export interface CloudWatchProviderConfig {
  metric_name: string;
  namespace: string;
  statistic?: string;
  target_value: number;
  dimensions?: Record<string, string>;
}

export interface AutoscalingProvider {
  type: ProviderType;
  sqs?: SqsProviderConfig;
  time?: TimeProviderConfig;
  cloudwatch?: CloudWatchProviderConfig;
}

export interface ScaleInGuard {
  mode: string;
  age_below_seconds?: number;
  visible_below?: number;
}

export interface AutoscalingPolicy {
  provider: AutoscalingProvider;
  min_tasks: number;
  max_tasks: number;
  cooldowns?: {
    scale_out_seconds?: number;
    scale_in_seconds?: number;
  };
  scale_in_guard?: ScaleInGuard;
}

/** Summary of what a provider will act on, for logs and callers. */
export type ProviderParameters = Record<string, string | number | boolean>;

export type PublishState =
  | 'ABSENT'
  | 'VALIDATING'
  | 'VALID'
  | 'INVALID'
  | 'PUBLISHING'
  | 'PUBLISHED'
  | 'SKIPPED'
  | 'PUBLISH_FAILED';

export type SkipReason = 'table-missing' | 'stale';

/** Terminal result of one publish attempt. */
export interface PublishOutcome {
  state: PublishState;
  published: boolean;
  serviceKey: string;
  checksum: string;
  /** Epoch seconds of the write attempt; 0 when nothing was attempted. */
  updatedAt: number;
  /** States visited, in order. */
  trail: PublishState[];
  version?: number;
  unchanged?: boolean;
  reason?: SkipReason;
  errors?: string[];
}
