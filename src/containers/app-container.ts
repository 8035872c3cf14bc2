import type { ContainerDefinition, ContainerDependency, KeyValuePair, MountPoint } from '@aws-sdk/client-ecs';
import { buildLinuxParameters } from '../config/platform.js';
import type { ResolvedSecret } from '../secrets/types.js';
import type { EnvEntry, ServiceConfig } from '../types/index.js';
import {
  APP_CONTAINER_NAME,
  FLUENT_BIT_CONTAINER_NAME,
  INIT_CONTAINER_NAME,
  SHARED_VOLUME_NAME,
  STREAM_PREFIX
} from './constants.js';
import { buildHealthCheck } from './health-check.js';
import { buildFirelensLogConfiguration, buildLogConfiguration } from './log-configuration.js';
import { buildPortMappings } from './ports.js';
import type { BuildContext } from './types.js';

export interface AppContainerOptions {
  secrets: ResolvedSecret[];
  hasSecretFiles: boolean;
  useFluentBit: boolean;
}

/** Flatten `envs` into name/value pairs; values are always strings. */
export function buildEnvironment(envs: EnvEntry[] = []): KeyValuePair[] {
  return envs.flatMap(entry => Object.entries(entry).map(([name, value]) => ({ name, value: String(value) })));
}

export function buildAppContainer(
  spec: ServiceConfig,
  context: BuildContext,
  options: AppContainerOptions
): ContainerDefinition {
  const container: ContainerDefinition = {
    name: APP_CONTAINER_NAME,
    image: context.imageUri,
    essential: true,
    environment: buildEnvironment(spec.envs),
    command: [...(spec.command ?? [])],
    entryPoint: [...(spec.entrypoint ?? [])],
    secrets: options.secrets.map(secret => ({ name: secret.name, valueFrom: secret.valueFrom }))
  };

  if (spec.stop_timeout !== undefined) {
    container.stopTimeout = spec.stop_timeout;
  }

  container.logConfiguration = options.useFluentBit
    ? buildFirelensLogConfiguration()
    : buildLogConfiguration(context, STREAM_PREFIX.app);

  const healthCheck = buildHealthCheck(spec.health_check);
  if (healthCheck) {
    container.healthCheck = healthCheck;
  }

  const portMappings = buildPortMappings(spec.port, spec.additional_ports ?? [], spec.app_protocol, spec.network_mode);
  if (portMappings.length > 0) {
    container.portMappings = portMappings;
  }

  const linuxParameters = buildLinuxParameters(spec.linux_parameters, spec.launch_type);
  if (linuxParameters) {
    container.linuxParameters = linuxParameters;
  }

  const dependsOn: ContainerDependency[] = [];
  if (options.hasSecretFiles) {
    const mountPoints: MountPoint[] = [{ sourceVolume: SHARED_VOLUME_NAME, containerPath: spec.secrets_files_path }];
    container.mountPoints = mountPoints;
    dependsOn.push({ containerName: INIT_CONTAINER_NAME, condition: 'SUCCESS' });
  }
  if (options.useFluentBit) {
    dependsOn.push({ containerName: FLUENT_BIT_CONTAINER_NAME, condition: 'START' });
  }
  if (dependsOn.length > 0) {
    container.dependsOn = dependsOn;
  }

  return container;
}
