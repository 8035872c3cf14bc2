import type { LogConfiguration } from '@aws-sdk/client-ecs';
import type { BuildContext } from './types.js';

/** CloudWatch Logs configuration shared by every container of the task. */
export function buildLogConfiguration(context: BuildContext, streamPrefix: string): LogConfiguration {
  return {
    logDriver: 'awslogs',
    options: {
      'awslogs-group': `/ecs/${context.cluster}/${context.appName}`,
      'awslogs-region': context.region,
      'awslogs-stream-prefix': streamPrefix
    }
  };
}

/** App logs are handed to the log router sidecar. */
export function buildFirelensLogConfiguration(): LogConfiguration {
  return { logDriver: 'awsfirelens', options: {} };
}
