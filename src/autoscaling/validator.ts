import { AutoscalingValidationError } from '../errors.js';
import { autoscalingPolicySchema } from './schema.js';
import type { AutoscalingPolicy, ProviderParameters, ProviderType, TimeProviderConfig } from './types.js';

export interface AutoscalingValidationResult {
  valid: boolean;
  errors: string[];
  policy?: AutoscalingPolicy;
}

interface ProviderHandler {
  validate(policy: AutoscalingPolicy): string[];
  parameters(policy: AutoscalingPolicy): ProviderParameters;
}

function validateSqs(policy: AutoscalingPolicy): string[] {
  return policy.provider.sqs ? [] : [`provider.sqs is required when provider.type is '${policy.provider.type}'`];
}

function validateTime(policy: AutoscalingPolicy): string[] {
  const time = policy.provider.time;
  if (!time) {
    return [`provider.time is required when provider.type is '${policy.provider.type}'`];
  }
  return validateTimeRules(time);
}

function validateTimeRules(time: TimeProviderConfig): string[] {
  const errors: string[] = [];

  if (time.mode === 'override' && !time.rules.some(rule => rule.desired !== undefined)) {
    errors.push("time.mode='override' requires at least one rule with 'desired' field");
  }

  time.rules.forEach((rule, idx) => {
    // zero-padded HH:MM compares correctly as text
    if (rule.start !== undefined && rule.end !== undefined && rule.start >= rule.end) {
      errors.push(`Rule ${idx}: start time (${rule.start}) must be before end time (${rule.end})`);
    }
  });

  return errors;
}

function sqsParameters(policy: AutoscalingPolicy): ProviderParameters {
  const sqs = policy.provider.sqs;
  return sqs
    ? {
        queueUrl: sqs.queue_url,
        ...(sqs.target_backlog_per_task !== undefined ? { targetBacklogPerTask: sqs.target_backlog_per_task } : {})
      }
    : {};
}

function timeParameters(policy: AutoscalingPolicy): ProviderParameters {
  const time = policy.provider.time;
  return time
    ? { timezone: time.timezone ?? 'UTC', timeMode: time.mode ?? 'floor', ruleCount: time.rules.length }
    : {};
}

// One handler per provider type; a new provider is a new entry here
const PROVIDER_HANDLERS: Record<ProviderType, ProviderHandler> = {
  sqs: {
    validate: validateSqs,
    parameters: sqsParameters
  },
  time: {
    validate: validateTime,
    parameters: timeParameters
  },
  'sqs+time': {
    validate: policy => [...validateSqs(policy), ...validateTime(policy)],
    parameters: policy => ({ ...sqsParameters(policy), ...timeParameters(policy) })
  },
  cloudwatch: {
    validate: policy =>
      policy.provider.cloudwatch ? [] : ["provider.cloudwatch is required when provider.type is 'cloudwatch'"],
    parameters: (policy): ProviderParameters => {
      const cloudwatch = policy.provider.cloudwatch;
      return cloudwatch
        ? {
            metricName: cloudwatch.metric_name,
            namespace: cloudwatch.namespace,
            statistic: cloudwatch.statistic ?? 'Average',
            targetValue: cloudwatch.target_value
          }
        : {};
    }
  }
};

function validateBounds(policy: AutoscalingPolicy): string[] {
  if (policy.max_tasks < policy.min_tasks) {
    return [`max_tasks (${policy.max_tasks}) must be >= min_tasks (${policy.min_tasks})`];
  }
  return [];
}

function validateScaleInGuard(policy: AutoscalingPolicy): string[] {
  const guard = policy.scale_in_guard;
  if (!guard || guard.mode !== 'low_latency') {
    return [];
  }
  const errors: string[] = [];
  if (guard.age_below_seconds === undefined) {
    errors.push("scale_in_guard with mode='low_latency' requires 'age_below_seconds'");
  }
  if (guard.visible_below === undefined) {
    errors.push("scale_in_guard with mode='low_latency' requires 'visible_below'");
  }
  return errors;
}

/**
 * Validate an `autoscaling_configs` block: schema first, then cross-field rules.
 */
export function validateAutoscalingPolicy(raw: unknown): AutoscalingValidationResult {
  const { error, value } = autoscalingPolicySchema.validate(raw, { abortEarly: false });
  if (error) {
    return { valid: false, errors: error.details.map(detail => detail.message) };
  }

  const errors = [
    ...validateBounds(value),
    ...PROVIDER_HANDLERS[value.provider.type].validate(value),
    ...validateScaleInGuard(value)
  ];

  return errors.length > 0 ? { valid: false, errors } : { valid: true, errors: [], policy: value };
}

/**
 * @throws AutoscalingValidationError
 */
export function assertValidAutoscalingPolicy(raw: unknown): AutoscalingPolicy {
  const result = validateAutoscalingPolicy(raw);
  if (!result.valid || !result.policy) {
    throw new AutoscalingValidationError(result.errors);
  }
  return result.policy;
}

export function providerParameters(policy: AutoscalingPolicy): ProviderParameters {
  return PROVIDER_HANDLERS[policy.provider.type].parameters(policy);
}
