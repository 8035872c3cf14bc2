// Container names, images and log stream prefixes

export const APP_CONTAINER_NAME = 'app';
export const INIT_CONTAINER_NAME = 'init-container-for-secret-files';
export const FLUENT_BIT_CONTAINER_NAME = 'fluent-bit';
export const OTEL_CONTAINER_NAME = 'otel-collector';

export const INIT_CONTAINER_IMAGE = 'public.ecr.aws/aws-cli/aws-cli:latest';
export const DEFAULT_OTEL_IMAGE = 'public.ecr.aws/aws-observability/aws-otel-collector:latest';

export const SHARED_VOLUME_NAME = 'shared-volume';

export const STREAM_PREFIX = {
  app: '/default',
  init: 'ssm-file-downloader',
  fluentBit: 'fluentbit',
  otel: 'otel-collector'
} as const;

export const FLUENT_BIT_DEFAULT_EXTRA_CONFIG = 'extra.conf';
export const FLUENT_BIT_HEALTH_COMMAND = 'curl -f http://127.0.0.1:2020/api/v1/health || exit 1';

export const OTEL_DEFAULT_SSM_CONFIG = 'adot-config-global.yaml';
export const OTEL_DEFAULT_CONFIG_FILE = 'config.yaml';
export const OTEL_DEFAULT_METRICS_PATH = '/metrics';
export const OTEL_DEFAULT_METRICS_PORT = 8080;
export const OTEL_GRPC_PORT = 4317;
export const OTEL_HTTP_PORT = 4318;
