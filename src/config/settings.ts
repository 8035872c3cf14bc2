import Joi from 'joi';
import { ConfigError } from '../errors.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Settings of the tool itself, as opposed to the service document it reads.
 */
export interface Settings {
  logLevel: LogLevel;
  logPretty: boolean;
  /** Total attempts (first call included) the AWS SDK makes before surfacing an error. */
  awsMaxAttempts: number;
  awsRetryMode: 'standard' | 'adaptive';
  commitSha?: string;
  githubOutput?: string;
}

const settingsSchema = Joi.object<Settings>({
  logLevel: Joi.string()
    .lowercase()
    .valid(...LOG_LEVELS)
    .default('info')
    .messages({
      'any.only': `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`
    }),
  logPretty: Joi.boolean().default(false),
  awsMaxAttempts: Joi.number()
    .integer()
    .min(1)
    .max(10)
    .default(3)
    .messages({
      'number.base': 'AWS_MAX_ATTEMPTS must be an integer',
      'number.min': 'AWS_MAX_ATTEMPTS must be at least 1',
      'number.max': 'AWS_MAX_ATTEMPTS must be no more than 10'
    }),
  awsRetryMode: Joi.string()
    .valid('standard', 'adaptive')
    .default('standard')
    .messages({
      'any.only': 'AWS_RETRY_MODE must be one of: standard, adaptive'
    }),
  commitSha: Joi.string().optional(),
  githubOutput: Joi.string().optional()
});

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Read settings from the environment
 * @param env - Environment to read, `process.env` by default
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw = {
    logLevel: nonEmpty(env.LOG_LEVEL),
    logPretty: nonEmpty(env.LOG_PRETTY),
    awsMaxAttempts: nonEmpty(env.AWS_MAX_ATTEMPTS),
    awsRetryMode: nonEmpty(env.AWS_RETRY_MODE),
    commitSha: nonEmpty(env.GITHUB_SHA),
    githubOutput: nonEmpty(env.GITHUB_OUTPUT)
  };

  const { error, value } = settingsSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new ConfigError('Invalid settings', error.details.map(detail => detail.message));
  }
  return value;
}
