import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SecretResolutionError } from '../../errors.js';
import {
  FakeSecretKeyDiscovery,
  InMemoryAutoscalingStore,
  TEST_ROLE_ARN,
  secretArn
} from '../../__tests__/fakes.js';
import { computeChecksum } from '../../autoscaling/checksum.js';
import { ServiceConfigLoader } from '../../config/loader.js';
import type { Settings } from '../../config/settings.js';
import type { DeploymentTarget } from '../../types/index.js';
import { GenerationOrchestrator, generateTaskDefinition, publishAutoscaling } from '../generation-orchestrator.js';
import type { OrchestratorDependencies } from '../types.js';

const REGISTRY = '123456789012.dkr.ecr.us-east-1.amazonaws.com';
const QUEUE_URL = 'https://sqs.us-east-1.amazonaws.com/123456789012/orders-queue';
const NOW = 1700000000;

const settings: Settings = {
  logLevel: 'fatal',
  logPretty: false,
  awsMaxAttempts: 3,
  awsRetryMode: 'standard',
  commitSha: 'abc123'
};

const target: DeploymentTarget = {
  cluster: 'main',
  region: 'us-east-1',
  registry: REGISTRY,
  containerRegistry: REGISTRY,
  imageName: 'api',
  tag: '1.2.3'
};

const SERVICE_YAML = `
name: api
cpu: 256
memory: 512
role_arn: "${TEST_ROLE_ARN}"
port: 8080
replica_count: 2
envs:
  - LOG_LEVEL: info
secrets_envs:
  - name: database-credentials
autoscaling_configs:
  provider:
    type: sqs
    sqs:
      queue_url: "${QUEUE_URL}"
  min_tasks: 2
  max_tasks: 50
services_overrides:
  worker:
    cpu: 512
    memory: 1024
    port: null
    envs:
      - WORKER_MODE: "true"
    autoscaling_configs:
      provider:
        type: sqs
        sqs:
          queue_url: "${QUEUE_URL}"
      min_tasks: 5
      max_tasks: 3
`;

describe('GenerationOrchestrator', () => {
  let testDir: string;
  let configPath: string;
  let discovery: FakeSecretKeyDiscovery;
  let store: InMemoryAutoscalingStore;
  let deps: OrchestratorDependencies;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'taskdef-orchestrator-'));
    configPath = join(testDir, 'service.yml');
    await writeFile(configPath, SERVICE_YAML, 'utf-8');

    discovery = new FakeSecretKeyDiscovery({
      'database-credentials': {
        DB_HOST: 'db.internal',
        DB_PORT: '5432',
        DB_USER: 'app',
        DB_PASSWORD: 'test-secret'
      }
    });
    store = new InMemoryAutoscalingStore();
    deps = {
      settings,
      loader: new ServiceConfigLoader({}),
      discovery,
      storeFactory: () => store,
      clock: () => NOW
    };
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('should expand a secret referenced by name without an init container', async () => {
      const result = await new GenerationOrchestrator(deps).generate({ configPath, target, service: 'api' });
      const arn = secretArn('database-credentials');

      expect(result.family).toBe('main_api');
      expect(result.appName).toBe('api');
      expect(result.replicaCount).toBe(2);
      expect(result.taskDefinition.containerDefinitions.map(container => container.name)).toEqual(['app']);
      expect(result.taskDefinition.containerDefinitions[0].secrets).toEqual([
        { name: 'DB_HOST', valueFrom: `${arn}:DB_HOST::` },
        { name: 'DB_PASSWORD', valueFrom: `${arn}:DB_PASSWORD::` },
        { name: 'DB_PORT', valueFrom: `${arn}:DB_PORT::` },
        { name: 'DB_USER', valueFrom: `${arn}:DB_USER::` }
      ]);
      expect(result.taskDefinition.containerDefinitions[0].image).toBe(`${REGISTRY}/api:1.2.3`);
      expect(result.taskDefinition.volumes).toBeUndefined();
      expect(discovery.calls).toEqual(['database-credentials']);
    });

    it('should generate the task definition of an override', async () => {
      const result = await new GenerationOrchestrator(deps).generate({ configPath, target, service: 'worker' });
      const [app] = result.taskDefinition.containerDefinitions;

      expect(result.family).toBe('main_worker');
      expect(result.taskDefinition.cpu).toBe('512');
      expect(result.taskDefinition.memory).toBe('1024');
      expect(app.portMappings).toBeUndefined();
      expect(app.environment).toEqual([
        { name: 'LOG_LEVEL', value: 'info' },
        { name: 'WORKER_MODE', value: 'true' }
      ]);
    });

    it('should not contact the secret store when no secret is referenced by name', async () => {
      const path = join(testDir, 'classic.yml');
      await writeFile(
        path,
        `role_arn: "${TEST_ROLE_ARN}"\ncpu: 256\nmemory: 512\nsecrets:\n  - DB_PASSWORD: "${secretArn('db')}"\n`,
        'utf-8'
      );

      const result = await generateTaskDefinition(
        { configPath: path, target, service: 'api' },
        { ...deps, discovery: undefined }
      );

      expect(result.secrets).toEqual([{ name: 'DB_PASSWORD', valueFrom: `${secretArn('db')}:DB_PASSWORD::` }]);
    });

    it('should fail when a secret lookup fails', async () => {
      const result = new GenerationOrchestrator({ ...deps, discovery: new FakeSecretKeyDiscovery({}) }).generate({
        configPath,
        target,
        service: 'api'
      });

      await expect(result).rejects.toBeInstanceOf(SecretResolutionError);
    });

    it.each([
      ['a list', 'autoscaling_configs:\n  - min_tasks: 1\n'],
      ['a string', 'autoscaling_configs: "not a mapping"\n']
    ])('should generate when the autoscaling block is %s', async (_label, block) => {
      const path = join(testDir, 'malformed-autoscaling.yml');
      await writeFile(path, `role_arn: "${TEST_ROLE_ARN}"\ncpu: 256\nmemory: 512\n${block}`, 'utf-8');
      const orchestrator = new GenerationOrchestrator(deps);

      const result = await orchestrator.generate({ configPath: path, target, service: 'api' });
      const outcome = await orchestrator.publishAutoscaling({
        configPath: path,
        environment: 'prod',
        cluster: 'main',
        service: 'api',
        region: 'us-east-1'
      });

      expect(result.family).toBe('main_api');
      expect(outcome.state).toBe('INVALID');
      expect(outcome.published).toBe(false);
      expect(store.records.size).toBe(0);
    });

    it('should reject an image without a tag', async () => {
      await expect(
        new GenerationOrchestrator(deps).generate({ configPath, target: { ...target, tag: '' }, service: 'api' })
      ).rejects.toThrow("Image tag is required for image 'api'");
    });
  });

  describe('validate', () => {
    it('should report the service and its autoscaling block', async () => {
      const report = await new GenerationOrchestrator(deps).validate(configPath, 'worker');

      expect(report.appName).toBe('worker');
      expect(report.secretReferenceCount).toBe(1);
      expect(report.autoscaling?.valid).toBe(false);
      expect(report.autoscaling?.errors).toEqual(['max_tasks (3) must be >= min_tasks (5)']);
      expect(discovery.calls).toEqual([]);
    });
  });

  describe('publishAutoscaling', () => {
    const options = {
      environment: 'prod',
      cluster: 'main',
      service: 'api',
      region: 'us-east-1'
    };

    it('should publish the base policy for a service without an override', async () => {
      const outcome = await publishAutoscaling({ ...options, configPath }, deps);

      expect(outcome.state).toBe('PUBLISHED');
      expect(outcome.serviceKey).toBe('prod:main:api');
      expect(outcome.checksum).toBe(
        computeChecksum({ provider: { type: 'sqs', sqs: { queue_url: QUEUE_URL } }, min_tasks: 2, max_tasks: 50 })
      );
      expect(store.records.get('prod:main:api')?.commit_sha).toBe('abc123');
    });

    it('should use an explicit commit over the environment one', async () => {
      await publishAutoscaling({ ...options, configPath, commitSha: 'def456' }, deps);

      expect(store.records.get('prod:main:api')?.commit_sha).toBe('def456');
    });

    it('should validate the override policy of the service', async () => {
      const outcome = await publishAutoscaling({ ...options, configPath, service: 'worker' }, deps);

      expect(outcome.state).toBe('INVALID');
      expect(outcome.errors).toEqual(['max_tasks (3) must be >= min_tasks (5)']);
      expect(store.records.size).toBe(0);
    });

    it('should report an unreadable document as invalid', async () => {
      const missing = join(testDir, 'missing.yml');

      const outcome = await publishAutoscaling({ ...options, configPath: missing }, deps);

      expect(outcome).toEqual({
        state: 'INVALID',
        published: false,
        serviceKey: 'prod:main:api',
        checksum: '',
        updatedAt: 0,
        trail: ['VALIDATING', 'INVALID'],
        errors: [`Configuration file not found: ${missing}`]
      });
    });

    it('should report a document without a policy as absent', async () => {
      const path = join(testDir, 'plain.yml');
      await writeFile(path, `role_arn: "${TEST_ROLE_ARN}"\n`, 'utf-8');

      const outcome = await publishAutoscaling({ ...options, configPath: path }, deps);

      expect(outcome.state).toBe('ABSENT');
    });
  });
});
