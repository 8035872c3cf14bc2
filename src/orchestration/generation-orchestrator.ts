import { AutoscalingPublisher } from '../autoscaling/publisher.js';
import { autoscalingTableName, buildServiceKey } from '../autoscaling/checksum.js';
import type { PublishOutcome } from '../autoscaling/types.js';
import { validateAutoscalingPolicy } from '../autoscaling/validator.js';
import { createConfigLoader, type ServiceConfigLoader } from '../config/loader.js';
import { OVERRIDES_KEY, isPlainObject, resolveServiceDocument } from '../config/merge.js';
import { loadSettings, type Settings } from '../config/settings.js';
import { buildContainers } from '../containers/index.js';
import { buildImageUri } from '../containers/images.js';
import { errorMessage } from '../errors.js';
import { DynamoDbAutoscalingStore } from '../provisioning/autoscaling-store.js';
import { SecretsManagerKeyDiscovery } from '../provisioning/secrets-manager.js';
import type { AutoscalingStore } from '../provisioning/types.js';
import { SecretResolver, parseSecretReferences } from '../secrets/resolver.js';
import type { SecretKeyDiscovery } from '../secrets/types.js';
import { TemplateEngine } from '../templates/template-engine.js';
import { getComponentLogger } from '../utils/logging.js';
import type {
  GenerateOptions,
  GenerationResult,
  OrchestratorDependencies,
  PublishAutoscalingOptions,
  ValidationReport
} from './types.js';

/**
 * Runs the generation pipeline (load, resolve secrets, build containers, assemble)
 * and the best-effort autoscaling publish
 */
export class GenerationOrchestrator {
  private readonly loader: ServiceConfigLoader;
  private readonly templateEngine = new TemplateEngine();
  private readonly logger = getComponentLogger('orchestrator');
  private settingsCache?: Settings;

  constructor(private readonly deps: OrchestratorDependencies = {}) {
    this.loader = deps.loader ?? createConfigLoader();
    this.settingsCache = deps.settings;
  }

  async generate(options: GenerateOptions): Promise<GenerationResult> {
    const { target } = options;
    const { spec, appName } = await this.loader.load(options.configPath, options.service);

    const imageUri = buildImageUri(target.containerRegistry, target.imageName, target.tag);

    const references = parseSecretReferences(spec);
    const needsDiscovery = references.some(
      reference => reference.kind === 'by-name' || (reference.kind === 'whole-secret' && reference.locator === undefined)
    );
    const resolver = new SecretResolver(needsDiscovery ? this.discovery(target.region) : undefined);
    const secrets = await resolver.resolve(references);

    const build = buildContainers(
      spec,
      { cluster: target.cluster, region: target.region, appName, imageUri, registry: target.registry },
      secrets
    );

    const taskDefinition = this.templateEngine.generateTaskDefinition({
      spec,
      appName,
      cluster: target.cluster,
      build
    });
    const family = taskDefinition.family ?? '';

    this.logger.info(
      { family, containers: build.containers.length, secrets: secrets.length },
      'Task definition generated'
    );

    return {
      taskDefinition,
      spec,
      appName,
      family,
      ...(spec.replica_count !== undefined ? { replicaCount: spec.replica_count } : {}),
      secrets
    };
  }

  /**
   * Load and validate without contacting AWS
   */
  async validate(configPath: string, service?: string): Promise<ValidationReport> {
    const { spec, appName } = await this.loader.load(configPath, service);
    const references = parseSecretReferences(spec);
    const autoscaling =
      spec.autoscaling_configs !== undefined ? validateAutoscalingPolicy(spec.autoscaling_configs) : undefined;

    return {
      spec,
      appName,
      secretReferenceCount: references.length,
      ...(autoscaling ? { autoscaling } : {})
    };
  }

  /**
   * Publish the autoscaling block of a service. Never throws.
   */
  async publishAutoscaling(options: PublishAutoscalingOptions): Promise<PublishOutcome> {
    const serviceKey = buildServiceKey(options.environment, options.cluster, options.service);

    let policy: unknown;
    let store: AutoscalingStore;
    let commitSha: string | undefined;
    try {
      const document = await this.loader.readDocument(options.configPath);
      const overrides = document[OVERRIDES_KEY];
      const hasOverride =
        isPlainObject(overrides) && Object.prototype.hasOwnProperty.call(overrides, options.service);
      policy = resolveServiceDocument(document, hasOverride ? options.service : undefined).autoscaling_configs;
      store = this.store(options.cluster, options.region);
      commitSha = options.commitSha ?? this.settings().commitSha;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ serviceKey, err: message }, 'Could not read autoscaling config; deploy continues');
      return {
        state: 'INVALID',
        published: false,
        serviceKey,
        checksum: '',
        updatedAt: 0,
        trail: ['VALIDATING', 'INVALID'],
        errors: [message]
      };
    }

    const publisher = new AutoscalingPublisher({ store, ...(this.deps.clock ? { clock: this.deps.clock } : {}) });
    return publisher.publish({
      policy,
      environment: options.environment,
      cluster: options.cluster,
      service: options.service,
      ...(commitSha ? { commitSha } : {})
    });
  }

  private settings(): Settings {
    if (!this.settingsCache) {
      this.settingsCache = loadSettings();
    }
    return this.settingsCache;
  }

  private discovery(region: string): SecretKeyDiscovery {
    if (this.deps.discovery) {
      return this.deps.discovery;
    }
    const settings = this.settings();
    return new SecretsManagerKeyDiscovery({
      region,
      maxAttempts: settings.awsMaxAttempts,
      retryMode: settings.awsRetryMode
    });
  }

  private store(cluster: string, region: string): AutoscalingStore {
    if (this.deps.storeFactory) {
      return this.deps.storeFactory(cluster, region);
    }
    const settings = this.settings();
    return new DynamoDbAutoscalingStore(autoscalingTableName(cluster), {
      region,
      maxAttempts: settings.awsMaxAttempts,
      retryMode: settings.awsRetryMode
    });
  }
}

/**
 * Generate a task definition with the default AWS-backed collaborators
 */
export async function generateTaskDefinition(
  options: GenerateOptions,
  deps: OrchestratorDependencies = {}
): Promise<GenerationResult> {
  return new GenerationOrchestrator(deps).generate(options);
}

export async function publishAutoscaling(
  options: PublishAutoscalingOptions,
  deps: OrchestratorDependencies = {}
): Promise<PublishOutcome> {
  return new GenerationOrchestrator(deps).publishAutoscaling(options);
}
