import { describe, it, expect } from 'vitest';
import type { ContainerDefinition } from '@aws-sdk/client-ecs';
import { ConfigError } from '../../errors.js';
import { serviceConfig } from '../../__tests__/fakes.js';
import { DEFAULT_OTEL_IMAGE } from '../constants.js';
import { buildContainers, type BuildContext } from '../index.js';
import { buildSecretFilesScript } from '../init-container.js';
import { buildVolumes, writableVolumeName } from '../volumes.js';

const REGISTRY = '123456789012.dkr.ecr.us-east-1.amazonaws.com';

const context: BuildContext = {
  cluster: 'main',
  region: 'us-east-1',
  appName: 'api',
  imageUri: `${REGISTRY}/api:1.2.3`,
  registry: REGISTRY
};

function container(containers: ContainerDefinition[], name: string): ContainerDefinition | undefined {
  return containers.find(candidate => candidate.name === name);
}

describe('buildContainers', () => {
  it('should build a single app container for a minimal service', () => {
    const result = buildContainers(serviceConfig({ port: 8080 }), context, []);

    expect(result.hasInitContainer).toBe(false);
    expect(result.dependencies).toEqual([]);
    expect(result.containers).toEqual([
      {
        name: 'app',
        image: `${REGISTRY}/api:1.2.3`,
        essential: true,
        environment: [],
        command: [],
        entryPoint: [],
        secrets: [],
        logConfiguration: {
          logDriver: 'awslogs',
          options: {
            'awslogs-group': '/ecs/main/api',
            'awslogs-region': 'us-east-1',
            'awslogs-stream-prefix': '/default'
          }
        },
        portMappings: [{ name: 'default', containerPort: 8080, hostPort: 8080, protocol: 'tcp', appProtocol: 'http' }]
      }
    ]);
    expect(Object.keys(result.containers[0])).toEqual([
      'name',
      'image',
      'essential',
      'environment',
      'command',
      'entryPoint',
      'secrets',
      'logConfiguration',
      'portMappings'
    ]);
  });

  it('should build the app container from the service document', () => {
    const spec = serviceConfig({
      envs: [{ LOG_LEVEL: 'info' }, { WORKERS: 4 }, { DEBUG: false }],
      command: ['node', 'server.js'],
      entrypoint: ['/usr/bin/dumb-init', '--'],
      stop_timeout: 30,
      health_check: { command: 'curl -f http://localhost:8080/health' }
    });
    const secrets = [{ name: 'DB_PASSWORD', valueFrom: 'arn:aws:secretsmanager:us-east-1:123456789012:secret:db:DB_PASSWORD::' }];

    const [app] = buildContainers(spec, context, secrets).containers;

    expect(app.environment).toEqual([
      { name: 'LOG_LEVEL', value: 'info' },
      { name: 'WORKERS', value: '4' },
      { name: 'DEBUG', value: 'false' }
    ]);
    expect(app.command).toEqual(['node', 'server.js']);
    expect(app.entryPoint).toEqual(['/usr/bin/dumb-init', '--']);
    expect(app.stopTimeout).toBe(30);
    expect(app.secrets).toEqual(secrets);
    expect(app.healthCheck?.command).toEqual(['CMD-SHELL', 'curl -f http://localhost:8080/health']);
    expect(app.portMappings).toBeUndefined();
  });

  it('should emit every optional container in start order', () => {
    const spec = serviceConfig({
      secret_files: ['tls-cert', 'tls-key'],
      fluent_bit_collector: { image_name: 'fluent-bit-custom:1.0' },
      otel_collector: {}
    });

    const result = buildContainers(spec, context, []);

    expect(result.containers.map(definition => definition.name)).toEqual([
      'init-container-for-secret-files',
      'app',
      'fluent-bit',
      'otel-collector'
    ]);
    expect(result.hasInitContainer).toBe(true);
    expect(result.dependencies).toEqual([
      { from: 'app', to: 'init-container-for-secret-files', condition: 'SUCCESS' },
      { from: 'app', to: 'fluent-bit', condition: 'START' }
    ]);
  });

  it('should download secret files before the app starts', () => {
    const result = buildContainers(serviceConfig({ secret_files: ['tls-cert', 'tls-key'] }), context, []);
    const init = container(result.containers, 'init-container-for-secret-files');
    const app = container(result.containers, 'app');

    expect(init?.essential).toBe(false);
    expect(init?.environment).toEqual([
      { name: 'SECRET_FILES', value: 'tls-cert,tls-key' },
      { name: 'AWS_REGION', value: 'us-east-1' }
    ]);
    expect(init?.mountPoints).toEqual([{ sourceVolume: 'shared-volume', containerPath: '/etc/secrets' }]);
    expect(init?.logConfiguration?.options?.['awslogs-stream-prefix']).toBe('ssm-file-downloader');
    expect(app?.mountPoints).toEqual([{ sourceVolume: 'shared-volume', containerPath: '/etc/secrets' }]);
    expect(app?.dependsOn).toEqual([{ containerName: 'init-container-for-secret-files', condition: 'SUCCESS' }]);
  });

  it('should route app logs through the log router', () => {
    const result = buildContainers(
      serviceConfig({ fluent_bit_collector: { image_name: 'fluent-bit-custom:1.0', service_name: 'payments' } }),
      context,
      []
    );
    const app = container(result.containers, 'app');
    const router = container(result.containers, 'fluent-bit');

    expect(app?.logConfiguration).toEqual({ logDriver: 'awsfirelens', options: {} });
    expect(router?.image).toBe(`${REGISTRY}/fluent-bit-custom:1.0`);
    expect(router?.essential).toBe(true);
    expect(router?.environment).toEqual([
      { name: 'SERVICE_NAME', value: 'payments' },
      { name: 'ENV', value: 'main' }
    ]);
    expect(router?.firelensConfiguration).toEqual({
      type: 'fluentbit',
      options: {
        'config-file-type': 'file',
        'config-file-value': 'extra/extra.conf',
        'enable-ecs-log-metadata': 'true'
      }
    });
  });

  it('should skip the log router without an image name', () => {
    const result = buildContainers(serviceConfig({ fluent_bit_collector: { image_name: '' } }), context, []);

    expect(result.containers.map(definition => definition.name)).toEqual(['app']);
    expect(result.containers[0].logConfiguration?.logDriver).toBe('awslogs');
  });

  it('should require a registry for a custom log router image', () => {
    expect(() =>
      buildContainers(
        serviceConfig({ fluent_bit_collector: { image_name: 'fluent-bit-custom:1.0' } }),
        { ...context, registry: '' },
        []
      )
    ).toThrow(ConfigError);
  });

  it('should configure the public telemetry collector from the parameter store', () => {
    const result = buildContainers(serviceConfig({ otel_collector: {} }), context, []);
    const otel = container(result.containers, 'otel-collector');

    expect(otel).toEqual({
      name: 'otel-collector',
      image: DEFAULT_OTEL_IMAGE,
      portMappings: [
        { name: 'otel-collector-4317-tcp', containerPort: 4317, hostPort: 4317, protocol: 'tcp', appProtocol: 'grpc' },
        { name: 'otel-collector-4318-tcp', containerPort: 4318, hostPort: 4318, protocol: 'tcp' }
      ],
      essential: true,
      command: ['--config', 'env:SSM_CONFIG'],
      logConfiguration: {
        logDriver: 'awslogs',
        options: {
          'awslogs-group': '/ecs/main/api',
          'awslogs-region': 'us-east-1',
          'awslogs-stream-prefix': 'otel-collector'
        }
      },
      environment: [
        { name: 'METRICS_PATH', value: '/metrics' },
        { name: 'METRICS_PORT', value: '8080' }
      ],
      secrets: [{ name: 'SSM_CONFIG', valueFrom: 'adot-config-global.yaml' }]
    });
  });

  it('should configure a custom telemetry collector from its bundled file', () => {
    const result = buildContainers(
      serviceConfig({ otel_collector: { image_name: 'otel-custom:2', extra_config: 'otel.yaml', metrics_port: 9464 } }),
      context,
      []
    );
    const otel = container(result.containers, 'otel-collector');

    expect(otel?.image).toBe(`${REGISTRY}/otel-custom:2`);
    expect(otel?.command).toEqual(['--config', '/conf/otel.yaml']);
    expect(otel?.environment).toEqual([
      { name: 'METRICS_PATH', value: '/metrics' },
      { name: 'METRICS_PORT', value: '9464' },
      { name: 'SERVICE_NAME', value: 'api' }
    ]);
    expect(otel).not.toHaveProperty('secrets');
  });

  it('should use dynamic host ports for the collector in bridge mode', () => {
    const result = buildContainers(
      serviceConfig({ launch_type: 'EC2', network_mode: 'bridge', port: 8080, otel_collector: {} }),
      context,
      []
    );

    expect(result.containers.flatMap(definition => definition.portMappings ?? []).map(mapping => mapping.hostPort)).toEqual([
      0, 0, 0
    ]);
  });

  it('should apply root filesystem settings to every container', () => {
    const result = buildContainers(
      serviceConfig({ readonly_root_filesystem: true, writable_dirs: ['/var/run', '/tmp'], otel_collector: {} }),
      context,
      []
    );

    expect(result.containers.map(definition => definition.readonlyRootFilesystem)).toEqual([true, true]);
    expect(container(result.containers, 'app')?.mountPoints).toEqual([
      { sourceVolume: 'writable-var-run', containerPath: '/var/run' },
      { sourceVolume: 'writable-tmp', containerPath: '/tmp' }
    ]);
  });

  it('should keep host-instance linux parameters on EC2', () => {
    const [app] = buildContainers(
      serviceConfig({ launch_type: 'EC2', linux_parameters: { shared_memory_size: 128 } }),
      context,
      []
    ).containers;

    expect(app.linuxParameters).toEqual({ sharedMemorySize: 128 });
  });

  it('should return fresh definitions on every call', () => {
    const spec = serviceConfig({ port: 8080, otel_collector: {} });

    const first = buildContainers(spec, context, []);
    const second = buildContainers(spec, context, []);

    expect(second).toEqual(first);
    expect(second.containers).not.toBe(first.containers);
    expect(second.containers[0]).not.toBe(first.containers[0]);
  });
});

describe('buildSecretFilesScript', () => {
  it('should write each secret under the mount path', () => {
    const script = buildSecretFilesScript('/etc/secrets');

    expect(script.startsWith('for secret in ${SECRET_FILES//,/ }; do')).toBe(true);
    expect(script).toContain(`printf '%s' "$SECRET_VALUE" > "/etc/secrets/$secret";`);
    expect(script).toContain('if [ ! -s "/etc/secrets/$secret" ]; then echo "Secret file $secret is empty" >&2; exit 1; fi;');
    expect(script.endsWith('done')).toBe(true);
  });
});

describe('volumes', () => {
  it('should derive writable volume names from paths', () => {
    expect(writableVolumeName('/var/run/')).toBe('writable-var-run');
    expect(writableVolumeName('/tmp')).toBe('writable-tmp');
  });

  it('should declare the shared volume before writable ones', () => {
    expect(buildVolumes(true, ['/tmp'])).toEqual([
      { name: 'shared-volume', host: {} },
      { name: 'writable-tmp', host: {} }
    ]);
    expect(buildVolumes(false)).toEqual([]);
  });
});
