import Joi from 'joi';
import { ConfigError } from '../errors.js';
import type { ServiceConfig } from '../types/index.js';
import type { ConfigValidationResult } from './types.js';
import { validatePlatform } from './platform.js';

const portSchema = Joi.number()
  .integer()
  .min(1)
  .max(65535)
  .messages({
    'number.base': 'Port must be a number',
    'number.min': 'Port must be between 1 and 65535',
    'number.max': 'Port must be between 1 and 65535'
  });

const positiveInteger = Joi.number().integer().positive();

const stringList = Joi.array().items(Joi.string());

// Joi schema for the health check block
const healthCheckSchema = Joi.object({
  command: Joi.alternatives()
    .try(Joi.string(), Joi.array().items(Joi.string()).min(1))
    .messages({
      'alternatives.types': 'health_check.command must be a string or a list of strings'
    }),
  interval: Joi.number().integer().min(5).max(300),
  timeout: Joi.number().integer().min(2).max(120),
  retries: Joi.number().integer().min(1).max(10),
  start_period: Joi.number().integer().min(0).max(300)
});

// Joi schema for secrets_envs entries; cross-field rules live in validateSecretsEnvs
const secretsEnvSchema = Joi.object({
  id: Joi.string().allow(''),
  name: Joi.string().allow(''),
  values: Joi.array()
    .items(
      Joi.string().trim().min(1).messages({
        'string.empty': 'secrets_envs values must be non-empty strings',
        'string.min': 'secrets_envs values must be non-empty strings'
      })
    ),
  env_name: Joi.string().allow(''),
  auto_parse_keys_to_envs: Joi.boolean()
});

// Joi schema for the log router sidecar
const fluentBitSchema = Joi.object({
  image_name: Joi.string().allow(''),
  extra_config: Joi.string(),
  ecs_log_metadata: Joi.alternatives().try(Joi.string(), Joi.boolean()),
  service_name: Joi.string()
});

// Joi schema for the telemetry collector sidecar
const otelCollectorSchema = Joi.object({
  image_name: Joi.string().allow(''),
  extra_config: Joi.string().allow(''),
  ssm_name: Joi.string(),
  metrics_port: portSchema,
  metrics_path: Joi.string().pattern(/^\//).messages({
    'string.pattern.base': 'otel_collector.metrics_path must start with "/"'
  })
});

// Joi schema for linux_parameters
const linuxParametersSchema = Joi.object({
  init_process_enabled: Joi.boolean(),
  capabilities: Joi.object({
    add: stringList,
    drop: stringList
  }),
  tmpfs: Joi.array().items(
    Joi.object({
      container_path: Joi.string().default('/tmp'),
      size: positiveInteger.default(64).messages({
        'number.base': 'tmpfs size must be a positive integer',
        'number.positive': 'tmpfs size must be a positive integer greater than zero'
      }),
      mount_options: stringList
    })
  ),
  swappiness: Joi.number().integer().min(0).max(100).messages({
    'number.min': 'swappiness must be between 0 and 100',
    'number.max': 'swappiness must be between 0 and 100'
  }),
  max_swap: Joi.number().integer().min(0).messages({
    'number.min': 'max_swap must be a non-negative integer'
  }),
  shared_memory_size: positiveInteger.messages({
    'number.positive': 'shared_memory_size must be a positive integer'
  }),
  devices: Joi.array().items(
    Joi.object({
      host_path: Joi.string().required().messages({
        'any.required': "Each entry in linux_parameters.devices must include a non-empty 'host_path'"
      }),
      container_path: Joi.string(),
      permissions: Joi.array().items(Joi.string().valid('read', 'write', 'mknod'))
    })
  )
});

// Keys of the resolved service document
const serviceConfigKeys = {
  name: Joi.string()
    .pattern(/^[a-zA-Z0-9-_]+$/)
    .max(255)
    .messages({
      'string.pattern.base': 'Service name must contain only alphanumeric characters, hyphens, and underscores'
    }),
  replica_count: Joi.number().integer().min(0),
  cpu: positiveInteger.messages({
    'number.base': 'cpu must be a positive integer',
    'number.positive': 'cpu must be a positive integer'
  }),
  memory: positiveInteger.messages({
    'number.base': 'memory must be a positive integer',
    'number.positive': 'memory must be a positive integer'
  }),
  cpu_arch: Joi.string()
    .uppercase()
    .valid('X86_64', 'ARM64')
    .default('X86_64'),
  launch_type: Joi.string()
    .uppercase()
    .valid('FARGATE', 'EC2')
    .default('FARGATE')
    .messages({
      'any.only': 'launch_type must be one of: FARGATE, EC2'
    }),
  network_mode: Joi.string()
    .lowercase()
    .valid('awsvpc', 'bridge', 'host', 'none')
    .default('awsvpc')
    .messages({
      'any.only': 'network_mode must be one of: awsvpc, bridge, host, none'
    }),
  role_arn: Joi.string()
    .required()
    .messages({
      'any.required': 'role_arn is required',
      'string.empty': 'role_arn is required'
    }),
  port: portSchema,
  additional_ports: Joi.array().items(
    Joi.object()
      .pattern(Joi.string(), portSchema)
      .length(1)
      .messages({
        'object.length': 'Each additional_ports entry must be a single name: port mapping'
      })
  ),
  app_protocol: Joi.string()
    .lowercase()
    .valid('http', 'http2', 'grpc', 'tcp')
    .default('http'),
  command: stringList,
  entrypoint: stringList,
  stop_timeout: Joi.number().integer().min(0).max(120),
  health_check: healthCheckSchema,
  envs: Joi.array().items(
    Joi.object()
      .pattern(Joi.string(), Joi.alternatives().try(Joi.string().allow(''), Joi.number(), Joi.boolean()))
      .min(1)
  ),
  secrets: Joi.array().items(
    Joi.object()
      .pattern(Joi.string(), Joi.string())
      .min(1)
      .messages({
        'object.min': 'Each secrets entry must map an environment name to a secret ARN'
      })
  ),
  secrets_envs: Joi.array().items(secretsEnvSchema).messages({
    'array.base': 'Invalid secrets_envs: must be a list of secret configurations'
  }),
  secret_files: Joi.array().items(Joi.string().min(1)),
  secrets_files_path: Joi.string()
    .pattern(/^\//)
    .default('/etc/secrets')
    .messages({
      'string.pattern.base': 'secrets_files_path must be an absolute path'
    }),
  fluent_bit_collector: fluentBitSchema,
  otel_collector: otelCollectorSchema,
  linux_parameters: linuxParametersSchema,
  readonly_root_filesystem: Joi.boolean(),
  writable_dirs: Joi.array().items(
    Joi.string().pattern(/^\//).messages({
      'string.pattern.base': 'writable_dirs entries must be absolute paths'
    })
  ),
  ephemeral_storage: Joi.number().integer().min(21).max(200).messages({
    'number.min': 'ephemeral_storage must be between 21 and 200 GiB',
    'number.max': 'ephemeral_storage must be between 21 and 200 GiB'
  }),
  // Checked by the autoscaling validator; a bad block never fails generation
  autoscaling_configs: Joi.any()
};

// Unknown top-level keys are tolerated; the loader warns about them
const serviceConfigSchema = Joi.object<ServiceConfig>(serviceConfigKeys).unknown(true);

export const KNOWN_SERVICE_KEYS: readonly string[] = Object.keys(serviceConfigKeys);

/**
 * Rules on secrets_envs that span several fields of one entry
 */
function validateSecretsEnvs(config: ServiceConfig): string[] {
  const errors: string[] = [];

  (config.secrets_envs ?? []).forEach((entry, idx) => {
    if (entry.auto_parse_keys_to_envs !== false) {
      return;
    }
    if (!entry.env_name || entry.env_name.trim() === '') {
      errors.push(`Invalid secrets_envs[${idx}]: env_name is required when auto_parse_keys_to_envs is false`);
    }
    const hasId = Boolean(entry.id && entry.id.trim());
    const hasName = Boolean(entry.name && entry.name.trim());
    if (!hasId && !hasName) {
      errors.push(`Invalid secrets_envs[${idx}]: either id or name is required when auto_parse_keys_to_envs is false`);
    }
  });

  return errors;
}

function validateSecretFiles(config: ServiceConfig): string[] {
  const files = config.secret_files ?? [];
  const duplicates = files.filter((file, idx) => files.indexOf(file) !== idx);
  return duplicates.map(file => `secret_files contains "${file}" more than once`);
}

/**
 * Validates a resolved service document
 * @param config - Document after override merging
 * @returns Validation result with all errors collected
 */
export function validateServiceConfig(config: unknown): ConfigValidationResult<ServiceConfig> {
  const { error, value } = serviceConfigSchema.validate(config, {
    abortEarly: false,
    convert: true
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  const errors = [...validatePlatform(value), ...validateSecretsEnvs(value), ...validateSecretFiles(value)];
  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, errors: [], value };
}

/**
 * Validates and normalizes a resolved service document, applying defaults
 * @throws ConfigError listing every problem found
 */
export function validateAndNormalizeServiceConfig(config: unknown): ServiceConfig {
  const result = validateServiceConfig(config);
  if (!result.valid || !result.value) {
    throw new ConfigError('Configuration validation failed', result.errors);
  }
  return result.value;
}
