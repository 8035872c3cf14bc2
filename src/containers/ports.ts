import type { PortMapping } from '@aws-sdk/client-ecs';
import type { AppProtocol, NamedPortEntry, NetworkMode } from '../types/index.js';

export const PRIMARY_PORT_NAME = 'default';

/** Bridge mode lets the agent pick a host port; every other mode maps the port as-is. */
export function hostPortFor(containerPort: number, networkMode: NetworkMode): number {
  return networkMode === 'bridge' ? 0 : containerPort;
}

export function buildPortMapping(
  name: string,
  containerPort: number,
  networkMode: NetworkMode,
  appProtocol: AppProtocol
): PortMapping {
  return {
    name,
    containerPort,
    hostPort: hostPortFor(containerPort, networkMode),
    protocol: 'tcp',
    ...(appProtocol === 'tcp' ? {} : { appProtocol })
  };
}

/**
 * Primary port first (named "default"), then additional ports in declaration order
 */
export function buildPortMappings(
  port: number | undefined,
  additionalPorts: NamedPortEntry[],
  appProtocol: AppProtocol,
  networkMode: NetworkMode
): PortMapping[] {
  const mappings: PortMapping[] = [];

  if (port !== undefined) {
    mappings.push(buildPortMapping(PRIMARY_PORT_NAME, port, networkMode, appProtocol));
  }

  for (const entry of additionalPorts) {
    for (const [name, containerPort] of Object.entries(entry)) {
      mappings.push(buildPortMapping(name, containerPort, networkMode, appProtocol));
    }
  }

  return mappings;
}
