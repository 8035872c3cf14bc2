import type { LinuxParameters } from '@aws-sdk/client-ecs';
import type { DevicePermission, LaunchType, LinuxParametersConfig, ServiceConfig } from '../types/index.js';
import { getComponentLogger } from '../utils/logging.js';

function steps(from: number, to: number, step: number): number[] {
  const values: number[] = [];
  for (let value = from; value <= to; value += step) {
    values.push(value);
  }
  return values;
}

/** Memory (MiB) accepted by Fargate for each CPU tier. */
export const FARGATE_MEMORY_BY_CPU: ReadonlyMap<number, readonly number[]> = new Map([
  [256, [512, 1024, 2048]],
  [512, steps(1024, 4096, 1024)],
  [1024, steps(2048, 8192, 1024)],
  [2048, steps(4096, 16384, 1024)],
  [4096, steps(8192, 30720, 1024)]
]);

const DEFAULT_DEVICE_PERMISSIONS: readonly DevicePermission[] = ['read', 'write'];

export const FARGATE_CPU_TIERS: readonly number[] = [...FARGATE_MEMORY_BY_CPU.keys()];

/**
 * Check CPU/memory sizing and network mode against the launch type
 * @returns Validation messages, empty when the combination is accepted
 */
export function validatePlatform(spec: ServiceConfig): string[] {
  const errors: string[] = [];

  if (spec.launch_type !== 'FARGATE') {
    // EC2 sizing is free-form; Joi already enforced positive integers
    return errors;
  }

  if (spec.network_mode !== 'awsvpc') {
    errors.push(`Fargate only supports 'awsvpc' network mode, got: ${spec.network_mode}`);
  }

  if (spec.cpu === undefined) {
    errors.push('"cpu" is required for the FARGATE launch type');
  }
  if (spec.memory === undefined) {
    errors.push('"memory" is required for the FARGATE launch type');
  }
  if (spec.cpu === undefined || spec.memory === undefined) {
    return errors;
  }

  const allowedMemory = FARGATE_MEMORY_BY_CPU.get(spec.cpu);
  if (!allowedMemory) {
    errors.push(`Invalid CPU value: ${spec.cpu}. Must be one of ${FARGATE_CPU_TIERS.join(', ')}`);
  } else if (!allowedMemory.includes(spec.memory)) {
    errors.push(
      `Invalid memory value ${spec.memory} for CPU ${spec.cpu}. Allowed: ${allowedMemory.join(', ')}`
    );
  }

  return errors;
}

/**
 * Translate `linux_parameters` into the container's `linuxParameters` block.
 * Host-instance only fields are dropped with a warning under FARGATE.
 */
export function buildLinuxParameters(
  config: LinuxParametersConfig | undefined,
  launchType: LaunchType
): LinuxParameters | undefined {
  if (!config) {
    return undefined;
  }

  const logger = getComponentLogger('platform');
  const params: LinuxParameters = {};

  if (config.init_process_enabled !== undefined) {
    params.initProcessEnabled = config.init_process_enabled;
  }

  const add = config.capabilities?.add ?? [];
  const drop = config.capabilities?.drop ?? [];
  if (add.length > 0 || drop.length > 0) {
    params.capabilities = {
      ...(add.length > 0 ? { add: [...add] } : {}),
      ...(drop.length > 0 ? { drop: [...drop] } : {})
    };
  }

  if (config.tmpfs && config.tmpfs.length > 0) {
    params.tmpfs = config.tmpfs.map(mount => ({
      containerPath: mount.container_path,
      size: mount.size,
      ...(mount.mount_options && mount.mount_options.length > 0 ? { mountOptions: [...mount.mount_options] } : {})
    }));
  }

  if (config.swappiness !== undefined) {
    params.swappiness = config.swappiness;
  }
  if (config.max_swap !== undefined) {
    params.maxSwap = config.max_swap;
  }

  if (config.shared_memory_size !== undefined) {
    if (launchType === 'FARGATE') {
      logger.warn('shared_memory_size is EC2-only, ignoring for Fargate launch type');
    } else {
      params.sharedMemorySize = config.shared_memory_size;
    }
  }

  if (config.devices && config.devices.length > 0) {
    if (launchType === 'FARGATE') {
      logger.warn('devices is EC2-only, ignoring for Fargate launch type');
    } else {
      params.devices = config.devices.map(device => ({
        hostPath: device.host_path,
        containerPath: device.container_path ?? device.host_path,
        permissions: [...(device.permissions ?? DEFAULT_DEVICE_PERMISSIONS)]
      }));
    }
  }

  return Object.keys(params).length > 0 ? params : undefined;
}
