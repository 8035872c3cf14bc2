import type { ContainerDefinition } from '@aws-sdk/client-ecs';
import type { FluentBitCollectorConfig, NetworkMode, OtelCollectorConfig } from '../types/index.js';
import {
  DEFAULT_OTEL_IMAGE,
  FLUENT_BIT_CONTAINER_NAME,
  FLUENT_BIT_DEFAULT_EXTRA_CONFIG,
  FLUENT_BIT_HEALTH_COMMAND,
  OTEL_CONTAINER_NAME,
  OTEL_DEFAULT_CONFIG_FILE,
  OTEL_DEFAULT_METRICS_PATH,
  OTEL_DEFAULT_METRICS_PORT,
  OTEL_DEFAULT_SSM_CONFIG,
  OTEL_GRPC_PORT,
  OTEL_HTTP_PORT,
  STREAM_PREFIX
} from './constants.js';
import { sidecarImageUri } from './images.js';
import { buildLogConfiguration } from './log-configuration.js';
import { buildPortMapping } from './ports.js';
import type { BuildContext } from './types.js';

export function usesFluentBit(config: FluentBitCollectorConfig | undefined): config is FluentBitCollectorConfig {
  return Boolean(config?.image_name?.trim());
}

/**
 * Log router sidecar. Essential: the task stops when log shipping stops.
 */
export function buildFluentBitContainer(config: FluentBitCollectorConfig, context: BuildContext): ContainerDefinition {
  const imageName = config.image_name?.trim() ?? '';
  const metadata = config.ecs_log_metadata ?? 'true';

  return {
    name: FLUENT_BIT_CONTAINER_NAME,
    image: sidecarImageUri(context.registry, imageName, 'fluent-bit'),
    essential: true,
    environment: [
      { name: 'SERVICE_NAME', value: config.service_name ?? context.appName },
      { name: 'ENV', value: context.cluster }
    ],
    healthCheck: {
      command: ['CMD-SHELL', FLUENT_BIT_HEALTH_COMMAND],
      interval: 10,
      timeout: 5,
      retries: 3,
      startPeriod: 5
    },
    logConfiguration: buildLogConfiguration(context, STREAM_PREFIX.fluentBit),
    firelensConfiguration: {
      type: 'fluentbit',
      options: {
        'config-file-type': 'file',
        'config-file-value': `extra/${config.extra_config ?? FLUENT_BIT_DEFAULT_EXTRA_CONFIG}`,
        'enable-ecs-log-metadata': String(metadata)
      }
    }
  };
}

/**
 * Telemetry collector sidecar. Without `image_name` the public collector image reads its
 * configuration from a parameter store entry; a custom image reads a bundled file.
 */
export function buildOtelContainer(
  config: OtelCollectorConfig,
  context: BuildContext,
  networkMode: NetworkMode
): ContainerDefinition {
  const customImage = config.image_name?.trim() ?? '';
  const isCustom = customImage !== '';
  const extraConfig = config.extra_config?.trim() || OTEL_DEFAULT_CONFIG_FILE;

  const environment = [
    { name: 'METRICS_PATH', value: config.metrics_path ?? OTEL_DEFAULT_METRICS_PATH },
    { name: 'METRICS_PORT', value: String(config.metrics_port ?? OTEL_DEFAULT_METRICS_PORT) },
    ...(isCustom ? [{ name: 'SERVICE_NAME', value: context.appName }] : [])
  ];

  return {
    name: OTEL_CONTAINER_NAME,
    image: isCustom ? sidecarImageUri(context.registry, customImage, 'otel-collector') : DEFAULT_OTEL_IMAGE,
    portMappings: [
      buildPortMapping(`${OTEL_CONTAINER_NAME}-${OTEL_GRPC_PORT}-tcp`, OTEL_GRPC_PORT, networkMode, 'grpc'),
      buildPortMapping(`${OTEL_CONTAINER_NAME}-${OTEL_HTTP_PORT}-tcp`, OTEL_HTTP_PORT, networkMode, 'tcp')
    ],
    essential: true,
    command: isCustom ? ['--config', `/conf/${extraConfig}`] : ['--config', 'env:SSM_CONFIG'],
    logConfiguration: buildLogConfiguration(context, STREAM_PREFIX.otel),
    environment,
    ...(isCustom ? {} : { secrets: [{ name: 'SSM_CONFIG', valueFrom: config.ssm_name?.trim() || OTEL_DEFAULT_SSM_CONFIG }] })
  };
}
