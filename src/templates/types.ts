// Template-specific types
import type { ContainerDefinition, RegisterTaskDefinitionCommandInput } from '@aws-sdk/client-ecs';
import type { ContainerBuildResult } from '../containers/types.js';
import type { ServiceConfig } from '../types/index.js';

/**
 * The generated document, shaped for `RegisterTaskDefinition` with the fields this tool sets.
 */
export type TaskDefinitionDocument = Pick<
  RegisterTaskDefinitionCommandInput,
  | 'family'
  | 'cpu'
  | 'memory'
  | 'taskRoleArn'
  | 'executionRoleArn'
  | 'networkMode'
  | 'requiresCompatibilities'
  | 'runtimePlatform'
  | 'ephemeralStorage'
  | 'volumes'
> & {
  containerDefinitions: ContainerDefinition[];
};

export interface AssembleInput {
  spec: ServiceConfig;
  appName: string;
  cluster: string;
  build: ContainerBuildResult;
}

export interface TemplateGenerator<TInput, TOutput> {
  generate(input: TInput): TOutput;
}

export interface RenderOptions {
  minify?: boolean;
  validate?: boolean;
}
