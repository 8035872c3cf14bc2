// Main entry point for the ECS task definition generator
export * from './types/index.js';
export * from './errors.js';
export { ServiceConfigLoader, createConfigLoader, loadServiceConfig } from './config/loader.js';
export { mergeServiceOverride, resolveServiceDocument, OVERRIDES_KEY } from './config/merge.js';
export { validateServiceConfig, validateAndNormalizeServiceConfig } from './config/validator.js';
export { validatePlatform, buildLinuxParameters, FARGATE_MEMORY_BY_CPU } from './config/platform.js';
export { loadSettings, type Settings, type LogLevel } from './config/settings.js';
export { parseSecretReferences, resolveServiceSecrets, SecretResolver } from './secrets/resolver.js';
export type * from './secrets/types.js';
export { buildContainers } from './containers/index.js';
export type { BuildContext, ContainerBuildResult, ContainerDependencyEdge } from './containers/index.js';
export { buildImageUri, parseImageParts } from './containers/images.js';
export { TaskDefinitionGenerator, taskFamily } from './templates/task-definition-generator.js';
export { TemplateEngine, renderTaskDefinition, validateTaskDefinition } from './templates/template-engine.js';
export type { TaskDefinitionDocument } from './templates/types.js';
export { AutoscalingPublisher } from './autoscaling/publisher.js';
export { validateAutoscalingPolicy, assertValidAutoscalingPolicy } from './autoscaling/validator.js';
export { computeChecksum, canonicalJson, buildServiceKey } from './autoscaling/checksum.js';
export type * from './autoscaling/types.js';
export { DynamoDbAutoscalingStore } from './provisioning/autoscaling-store.js';
export { SecretsManagerKeyDiscovery } from './provisioning/secrets-manager.js';
export type * from './provisioning/types.js';
export {
  GenerationOrchestrator,
  generateTaskDefinition,
  publishAutoscaling
} from './orchestration/generation-orchestrator.js';
export type * from './orchestration/types.js';
export { autoscalerOutputs } from './orchestration/outputs.js';
