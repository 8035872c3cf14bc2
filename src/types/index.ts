// Core type definitions for the ECS task definition generator

export type LaunchType = 'FARGATE' | 'EC2';
export type NetworkMode = 'awsvpc' | 'bridge' | 'host' | 'none';
export type CpuArchitecture = 'X86_64' | 'ARM64';
export type AppProtocol = 'http' | 'http2' | 'grpc' | 'tcp';

/** A single `NAME: value` entry from the `envs` list. */
export type EnvEntry = Record<string, string | number | boolean>;

/** A single `name: port` entry from the `additional_ports` list. */
export type NamedPortEntry = Record<string, number>;

/** A single `ENV_NAME: locator` entry from the classic `secrets` list. */
export type ClassicSecretEntry = Record<string, string>;

export interface HealthCheckConfig {
  command?: string | string[];
  interval?: number;
  timeout?: number;
  retries?: number;
  start_period?: number;
}

export interface SecretsEnvEntry {
  id?: string;
  name?: string;
  values?: string[];
  env_name?: string;
  auto_parse_keys_to_envs?: boolean;
}

export interface FluentBitCollectorConfig {
  image_name?: string;
  extra_config?: string;
  ecs_log_metadata?: string | boolean;
  service_name?: string;
}

export interface OtelCollectorConfig {
  image_name?: string;
  extra_config?: string;
  ssm_name?: string;
  metrics_port?: number;
  metrics_path?: string;
}

export interface TmpfsMountConfig {
  container_path: string;
  size: number;
  mount_options?: string[];
}

export type DevicePermission = 'read' | 'write' | 'mknod';

export interface DeviceMappingConfig {
  host_path: string;
  container_path?: string;
  permissions?: DevicePermission[];
}

export interface LinuxParametersConfig {
  init_process_enabled?: boolean;
  capabilities?: {
    add?: string[];
    drop?: string[];
  };
  tmpfs?: TmpfsMountConfig[];
  swappiness?: number;
  max_swap?: number;
  /** Host-instance only (EC2). */
  shared_memory_size?: number;
  /** Host-instance only (EC2). */
  devices?: DeviceMappingConfig[];
}

/**
 * Resolved single-service configuration, after environment substitution,
 * `services_overrides` merging and validation with defaults applied.
 */
export interface ServiceConfig {
  name?: string;
  replica_count?: number;
  cpu?: number;
  memory?: number;
  cpu_arch: CpuArchitecture;
  launch_type: LaunchType;
  network_mode: NetworkMode;
  role_arn: string;
  port?: number;
  additional_ports?: NamedPortEntry[];
  app_protocol: AppProtocol;
  command?: string[];
  entrypoint?: string[];
  stop_timeout?: number;
  health_check?: HealthCheckConfig;
  envs?: EnvEntry[];
  secrets?: ClassicSecretEntry[];
  secrets_envs?: SecretsEnvEntry[];
  secret_files?: string[];
  secrets_files_path: string;
  fluent_bit_collector?: FluentBitCollectorConfig;
  otel_collector?: OtelCollectorConfig;
  linux_parameters?: LinuxParametersConfig;
  readonly_root_filesystem?: boolean;
  writable_dirs?: string[];
  ephemeral_storage?: number;
  /** Validated separately and never fatal to generation. */
  autoscaling_configs?: unknown;
}

/** A loaded service plus the name it is deployed under. */
export interface LoadedService {
  spec: ServiceConfig;
  appName: string;
  selector?: string;
}

/** External inputs that identify where and what is being deployed. */
export interface DeploymentTarget {
  cluster: string;
  region: string;
  /** Registry for private sidecar images (log router, custom telemetry collector). */
  registry?: string;
  /** Registry for the main application image. */
  containerRegistry?: string;
  imageName: string;
  tag: string;
}
