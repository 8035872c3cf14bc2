import type { ContainerDefinition, Volume } from '@aws-sdk/client-ecs';
import { SHARED_VOLUME_NAME } from './constants.js';

/** `/var/run` becomes `writable-var-run`. */
export function writableVolumeName(path: string): string {
  return `writable-${path.replace(/^\/+|\/+$/g, '').replace(/\//g, '-')}`;
}

/**
 * Task volumes: the shared secret-files volume when the init container exists,
 * then one volume per writable directory
 */
export function buildVolumes(hasInitContainer: boolean, writableDirs: string[] = []): Volume[] {
  return [
    ...(hasInitContainer ? [{ name: SHARED_VOLUME_NAME, host: {} }] : []),
    ...writableDirs.map(dir => ({ name: writableVolumeName(dir), host: {} }))
  ];
}

/**
 * Apply root filesystem settings to every container; returns new definitions
 */
export function applyFilesystemSettings(
  containers: ContainerDefinition[],
  readonlyRootFilesystem: boolean | undefined,
  writableDirs: string[] = []
): ContainerDefinition[] {
  return containers.map(container => {
    const updated: ContainerDefinition = { ...container };
    if (readonlyRootFilesystem !== undefined) {
      updated.readonlyRootFilesystem = readonlyRootFilesystem;
    }
    if (writableDirs.length > 0) {
      updated.mountPoints = [
        ...(container.mountPoints ?? []),
        ...writableDirs.map(dir => ({ sourceVolume: writableVolumeName(dir), containerPath: dir }))
      ];
    }
    return updated;
  });
}
