import Joi from 'joi';
import { PROVIDER_TYPES, type AutoscalingPolicy } from './types.js';

export const HH_MM_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export const SQS_QUEUE_URL_PATTERN = /^https:\/\/sqs\.[a-z0-9-]+\.amazonaws\.com\/\d{12}\/[A-Za-z0-9_-]{1,80}(\.fifo)?$/;

const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];

const nonNegativeInteger = Joi.number().integer().min(0);

const timeOfDay = Joi.string().pattern(HH_MM_PATTERN).messages({
  'string.pattern.base': '{{#label}} must be in HH:MM format (e.g. 09:00)'
});

const sqsSchema = Joi.object({
  queue_url: Joi.string().required().pattern(SQS_QUEUE_URL_PATTERN).messages({
    'any.required': 'provider.sqs.queue_url is required',
    'string.pattern.base': 'provider.sqs.queue_url must look like https://sqs.<region>.amazonaws.com/<account-id>/<queue-name>'
  }),
  target_backlog_per_task: Joi.number().positive()
}).unknown(true);

const timeRuleSchema = Joi.object({
  days: Joi.array()
    .items(Joi.string().lowercase().valid(...WEEKDAYS))
    .min(1)
    .required()
    .messages({
      'any.required': 'Each time rule requires a non-empty "days" list',
      'array.min': 'Each time rule requires a non-empty "days" list'
    }),
  start: timeOfDay,
  end: timeOfDay,
  min_desired: nonNegativeInteger,
  desired: nonNegativeInteger
});

const timeSchema = Joi.object({
  timezone: Joi.string(),
  mode: Joi.string().valid('floor', 'override'),
  rules: Joi.array().items(timeRuleSchema).min(1).required().messages({
    'any.required': 'provider.time.rules is required',
    'array.min': 'provider.time.rules must contain at least one rule'
  })
});

const cloudWatchSchema = Joi.object({
  metric_name: Joi.string().required(),
  namespace: Joi.string().required(),
  statistic: Joi.string().valid('Average', 'Sum', 'Minimum', 'Maximum', 'SampleCount'),
  target_value: Joi.number().positive().required(),
  dimensions: Joi.object().pattern(Joi.string(), Joi.string())
});

export const autoscalingPolicySchema = Joi.object<AutoscalingPolicy>({
  provider: Joi.object({
    type: Joi.string()
      .valid(...PROVIDER_TYPES)
      .required()
      .messages({
        'any.only': `provider.type must be one of: ${PROVIDER_TYPES.join(', ')}`,
        'any.required': 'provider.type is required'
      }),
    sqs: sqsSchema,
    time: timeSchema,
    cloudwatch: cloudWatchSchema
  }).required(),
  min_tasks: nonNegativeInteger.required(),
  max_tasks: nonNegativeInteger.min(1).required(),
  cooldowns: Joi.object({
    scale_out_seconds: nonNegativeInteger,
    scale_in_seconds: nonNegativeInteger
  }),
  scale_in_guard: Joi.object({
    mode: Joi.string().required(),
    age_below_seconds: nonNegativeInteger,
    visible_below: nonNegativeInteger
  })
});
