// Orchestration-specific types
import type { AutoscalingValidationResult } from '../autoscaling/validator.js';
import type { ServiceConfigLoader } from '../config/loader.js';
import type { Settings } from '../config/settings.js';
import type { AutoscalingStore } from '../provisioning/types.js';
import type { ResolvedSecret, SecretKeyDiscovery } from '../secrets/types.js';
import type { TaskDefinitionDocument } from '../templates/types.js';
import type { DeploymentTarget, ServiceConfig } from '../types/index.js';

export interface OrchestratorDependencies {
  settings?: Settings;
  loader?: ServiceConfigLoader;
  /** Remote secret lookup; built from settings for the target region when omitted. */
  discovery?: SecretKeyDiscovery;
  storeFactory?: (cluster: string, region: string) => AutoscalingStore;
  /** Epoch seconds. */
  clock?: () => number;
}

export interface GenerateOptions {
  configPath: string;
  target: DeploymentTarget;
  /** Service or task name; selects the `services_overrides` entry. */
  service?: string;
}

export interface GenerationResult {
  taskDefinition: TaskDefinitionDocument;
  spec: ServiceConfig;
  appName: string;
  family: string;
  replicaCount?: number;
  secrets: ResolvedSecret[];
}

export interface ValidationReport {
  spec: ServiceConfig;
  appName: string;
  secretReferenceCount: number;
  /** Absent when the document has no autoscaling block. */
  autoscaling?: AutoscalingValidationResult;
}

export interface PublishAutoscalingOptions {
  configPath: string;
  environment: string;
  cluster: string;
  service: string;
  region: string;
  commitSha?: string;
}
