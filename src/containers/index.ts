import type { ContainerDefinition } from '@aws-sdk/client-ecs';
import type { ResolvedSecret } from '../secrets/types.js';
import type { ServiceConfig } from '../types/index.js';
import { getComponentLogger } from '../utils/logging.js';
import { buildAppContainer } from './app-container.js';
import { buildInitContainer } from './init-container.js';
import { buildFluentBitContainer, buildOtelContainer, usesFluentBit } from './sidecars.js';
import type { BuildContext, ContainerBuildResult, ContainerDependencyEdge } from './types.js';
import { applyFilesystemSettings } from './volumes.js';

export type { BuildContext, ContainerBuildResult, ContainerDependencyEdge } from './types.js';

function dependencyEdges(containers: ContainerDefinition[]): ContainerDependencyEdge[] {
  return containers.flatMap(container =>
    (container.dependsOn ?? []).flatMap(dependency =>
      container.name && dependency.containerName && dependency.condition
        ? [{ from: container.name, to: dependency.containerName, condition: dependency.condition }]
        : []
    )
  );
}

/**
 * Build every container of the task, in start order: init container, app, log router,
 * telemetry collector. Returns fresh definitions on every call.
 */
export function buildContainers(
  spec: ServiceConfig,
  context: BuildContext,
  secrets: ResolvedSecret[]
): ContainerBuildResult {
  const secretFiles = spec.secret_files ?? [];
  const hasSecretFiles = secretFiles.length > 0;
  const fluentBit = spec.fluent_bit_collector;
  const useFluentBit = usesFluentBit(fluentBit);

  const containers: ContainerDefinition[] = [];

  if (hasSecretFiles) {
    containers.push(buildInitContainer(secretFiles, spec.secrets_files_path, context));
  }

  containers.push(buildAppContainer(spec, context, { secrets, hasSecretFiles, useFluentBit }));

  if (fluentBit && useFluentBit) {
    containers.push(buildFluentBitContainer(fluentBit, context));
  }

  if (spec.otel_collector) {
    containers.push(buildOtelContainer(spec.otel_collector, context, spec.network_mode));
  }

  const finalContainers = applyFilesystemSettings(containers, spec.readonly_root_filesystem, spec.writable_dirs);

  getComponentLogger('containers').debug(
    { containers: finalContainers.map(container => container.name) },
    `Built ${finalContainers.length} container definitions`
  );

  return {
    containers: finalContainers,
    dependencies: dependencyEdges(finalContainers),
    hasInitContainer: hasSecretFiles
  };
}
