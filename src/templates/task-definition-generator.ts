import { ConfigError } from '../errors.js';
import { buildVolumes } from '../containers/volumes.js';
import { getComponentLogger } from '../utils/logging.js';
import type { AssembleInput, TaskDefinitionDocument, TemplateGenerator } from './types.js';

export function taskFamily(cluster: string, appName: string): string {
  return `${cluster}_${appName}`;
}

/**
 * Assembles the registration document from the built containers
 */
export class TaskDefinitionGenerator implements TemplateGenerator<AssembleInput, TaskDefinitionDocument> {
  generate({ spec, appName, cluster, build }: AssembleInput): TaskDefinitionDocument {
    const logger = getComponentLogger('task-definition');
    const isFargate = spec.launch_type === 'FARGATE';
    if (isFargate && (spec.cpu === undefined || spec.memory === undefined)) {
      throw new ConfigError('"cpu" and "memory" are required for the FARGATE launch type');
    }

    const document: TaskDefinitionDocument = {
      containerDefinitions: build.containers,
      ...(spec.cpu !== undefined ? { cpu: String(spec.cpu) } : {}),
      ...(spec.memory !== undefined ? { memory: String(spec.memory) } : {}),
      family: taskFamily(cluster, appName),
      taskRoleArn: spec.role_arn,
      executionRoleArn: spec.role_arn,
      networkMode: spec.network_mode,
      requiresCompatibilities: [spec.launch_type]
    };

    if (isFargate) {
      document.runtimePlatform = {
        cpuArchitecture: spec.cpu_arch,
        operatingSystemFamily: 'LINUX'
      };
    }

    if (spec.ephemeral_storage !== undefined) {
      if (isFargate) {
        document.ephemeralStorage = { sizeInGiB: spec.ephemeral_storage };
      } else {
        logger.warn('ephemeral_storage is Fargate-only, ignoring for EC2 launch type');
      }
    }

    const volumes = buildVolumes(build.hasInitContainer, spec.writable_dirs);
    if (volumes.length > 0) {
      document.volumes = volumes;
    }

    logger.info(
      { family: document.family, launchType: spec.launch_type, networkMode: spec.network_mode },
      'Assembled task definition'
    );
    return document;
  }
}
