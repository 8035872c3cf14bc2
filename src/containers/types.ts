import type { ContainerCondition, ContainerDefinition } from '@aws-sdk/client-ecs';

/** Per-run inputs that do not come from the service document. */
export interface BuildContext {
  cluster: string;
  region: string;
  appName: string;
  /** Fully qualified image of the app container. */
  imageUri: string;
  /** Registry for private sidecar images. */
  registry?: string;
}

/** `from` may start only once `to` has reached `condition`. */
export interface ContainerDependencyEdge {
  from: string;
  to: string;
  condition: ContainerCondition;
}

export interface ContainerBuildResult {
  /** Init container, app, log router, telemetry collector; absent ones skipped. */
  containers: ContainerDefinition[];
  dependencies: ContainerDependencyEdge[];
  hasInitContainer: boolean;
}
