import { ConfigError } from '../errors.js';
import { TaskDefinitionGenerator } from './task-definition-generator.js';
import type { AssembleInput, RenderOptions, TaskDefinitionDocument } from './types.js';

/**
 * Internal consistency checks on an assembled document
 * @returns One message per problem, empty when the document is consistent
 */
export function validateTaskDefinition(document: TaskDefinitionDocument): string[] {
  const errors: string[] = [];
  const names = document.containerDefinitions.map(container => container.name ?? '');
  const volumes = new Set((document.volumes ?? []).map(volume => volume.name));

  names.forEach((name, idx) => {
    if (!name) {
      errors.push(`Container at index ${idx} has no name`);
    } else if (names.indexOf(name) !== idx) {
      errors.push(`Container name '${name}' is used more than once`);
    }
  });

  if (!document.containerDefinitions.some(container => container.essential)) {
    errors.push('At least one container must be essential');
  }

  for (const container of document.containerDefinitions) {
    for (const dependency of container.dependsOn ?? []) {
      if (!dependency.containerName || !names.includes(dependency.containerName)) {
        errors.push(`Container '${container.name}' depends on unknown container '${dependency.containerName}'`);
      }
    }
    for (const mountPoint of container.mountPoints ?? []) {
      if (!mountPoint.sourceVolume || !volumes.has(mountPoint.sourceVolume)) {
        errors.push(`Container '${container.name}' mounts undeclared volume '${mountPoint.sourceVolume}'`);
      }
    }
  }

  if (document.requiresCompatibilities?.includes('FARGATE')) {
    if (document.networkMode !== 'awsvpc') {
      errors.push(`FARGATE tasks require networkMode 'awsvpc', got '${document.networkMode}'`);
    }
    if (!document.runtimePlatform) {
      errors.push('FARGATE tasks require a runtimePlatform');
    }
  }

  return errors;
}

/**
 * Serialize a task definition as JSON, 2-space indented unless minified
 * @throws ConfigError when validation is requested and fails
 */
export function renderTaskDefinition(document: TaskDefinitionDocument, options: RenderOptions = {}): string {
  if (options.validate) {
    const errors = validateTaskDefinition(document);
    if (errors.length > 0) {
      throw new ConfigError('Generated task definition is inconsistent', errors);
    }
  }
  return options.minify ? JSON.stringify(document) : JSON.stringify(document, null, 2);
}

export class TemplateEngine {
  private generator = new TaskDefinitionGenerator();

  /**
   * Assemble and validate the document in one step
   */
  generateTaskDefinition(input: AssembleInput): TaskDefinitionDocument {
    const document = this.generator.generate(input);
    const errors = validateTaskDefinition(document);
    if (errors.length > 0) {
      throw new ConfigError('Generated task definition is inconsistent', errors);
    }
    return document;
  }

  render(document: TaskDefinitionDocument, options: RenderOptions = {}): string {
    return renderTaskDefinition(document, options);
  }
}
