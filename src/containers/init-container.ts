import type { ContainerDefinition } from '@aws-sdk/client-ecs';
import { INIT_CONTAINER_IMAGE, INIT_CONTAINER_NAME, SHARED_VOLUME_NAME, STREAM_PREFIX } from './constants.js';
import { buildLogConfiguration } from './log-configuration.js';
import type { BuildContext } from './types.js';

/**
 * Shell loop that downloads every secret in $SECRET_FILES into `mountPath`.
 * Text values are tried first, then binary ones; an empty or failed download exits 1.
 */
export function buildSecretFilesScript(mountPath: string): string {
  const target = `${mountPath}/$secret`;
  return [
    'for secret in ${SECRET_FILES//,/ }; do',
    '  echo "Fetching $secret...";',
    '  SECRET_VALUE=$(aws secretsmanager get-secret-value --secret-id "$secret" --region "$AWS_REGION" --query SecretString --output text 2>/dev/null);',
    '  STRING_RESULT=$?;',
    '  if [ $STRING_RESULT -eq 0 ] && [ -n "$SECRET_VALUE" ] && [ "$SECRET_VALUE" != "null" ] && [ "$SECRET_VALUE" != "None" ]; then',
    `    printf '%s' "$SECRET_VALUE" > "${target}";`,
    '  else',
    `    aws secretsmanager get-secret-value --secret-id "$secret" --region "$AWS_REGION" --query SecretBinary --output text | base64 -d > "${target}" 2>/dev/null;`,
    '    BINARY_RESULT=$?;',
    `    if [ $BINARY_RESULT -ne 0 ] || [ ! -s "${target}" ]; then`,
    '      echo "Failed to retrieve $secret as either text or binary" >&2;',
    '      exit 1;',
    '    fi;',
    '  fi;',
    `  if [ ! -s "${target}" ]; then echo "Secret file $secret is empty" >&2; exit 1; fi;`,
    `  echo "Saved $secret to ${target}";`,
    'done'
  ].join(' ');
}

/**
 * Non-essential container that writes `secret_files` onto the shared volume before the app starts
 */
export function buildInitContainer(
  secretFiles: string[],
  mountPath: string,
  context: BuildContext
): ContainerDefinition {
  return {
    name: INIT_CONTAINER_NAME,
    image: INIT_CONTAINER_IMAGE,
    essential: false,
    entryPoint: ['/bin/sh'],
    command: ['-c', buildSecretFilesScript(mountPath)],
    environment: [
      { name: 'SECRET_FILES', value: secretFiles.join(',') },
      { name: 'AWS_REGION', value: context.region }
    ],
    mountPoints: [{ sourceVolume: SHARED_VOLUME_NAME, containerPath: mountPath }],
    logConfiguration: buildLogConfiguration(context, STREAM_PREFIX.init)
  };
}
