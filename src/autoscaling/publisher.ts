import { errorMessage } from '../errors.js';
import type { AutoscalingStore } from '../provisioning/types.js';
import { getComponentLogger } from '../utils/logging.js';
import { buildServiceKey, computeChecksum, withSchemaVersion } from './checksum.js';
import type { PublishOutcome, PublishState } from './types.js';
import { providerParameters, validateAutoscalingPolicy } from './validator.js';

export interface PublishRequest {
  /** The raw `autoscaling_configs` block; undefined or null when the service has none. */
  policy: unknown;
  environment: string;
  cluster: string;
  service: string;
  commitSha?: string;
}

export interface AutoscalingPublisherOptions {
  store: AutoscalingStore;
  /** Epoch seconds. */
  clock?: () => number;
}

const epochSeconds = () => Math.floor(Date.now() / 1000);

/**
 * Validates an autoscaling policy and writes it with a conditional update.
 * Best-effort: every failure ends in a terminal state, nothing is thrown.
 */
export class AutoscalingPublisher {
  private readonly store: AutoscalingStore;
  private readonly clock: () => number;
  private readonly logger = getComponentLogger('autoscaling');

  constructor(options: AutoscalingPublisherOptions) {
    this.store = options.store;
    this.clock = options.clock ?? epochSeconds;
  }

  async publish(request: PublishRequest): Promise<PublishOutcome> {
    const serviceKey = buildServiceKey(request.environment, request.cluster, request.service);
    const trail: PublishState[] = [];
    const finish = (state: PublishState, fields: Partial<PublishOutcome> = {}): PublishOutcome => {
      trail.push(state);
      return {
        published: false,
        serviceKey,
        checksum: '',
        updatedAt: 0,
        ...fields,
        state,
        trail
      };
    };

    if (request.policy === undefined || request.policy === null) {
      this.logger.info('No autoscaling_configs block found, nothing to publish');
      return finish('ABSENT');
    }

    trail.push('VALIDATING');
    const validation = validateAutoscalingPolicy(request.policy);
    if (!validation.valid || !validation.policy) {
      const errors = validation.errors;
      this.logger.error({ serviceKey, errors }, 'Autoscaling config validation failed; not published, deploy continues');
      return finish('INVALID', { errors });
    }
    const policy = validation.policy;
    trail.push('VALID');

    const checksum = computeChecksum(policy);
    this.logger.debug(
      { serviceKey, provider: policy.provider.type, ...providerParameters(policy) },
      'Autoscaling config validation passed'
    );

    trail.push('PUBLISHING');
    const updatedAt = this.clock();
    try {
      if (!(await this.store.tableExists())) {
        this.logger.warn({ table: this.store.tableName }, 'Autoscaling table does not exist, skipping publish');
        return finish('SKIPPED', { checksum, updatedAt, reason: 'table-missing' });
      }

      const result = await this.store.putIfNotNewer({
        service_key: serviceKey,
        env: request.environment,
        config: withSchemaVersion(policy),
        checksum,
        commit_sha: request.commitSha ?? 'unknown',
        updated_at: updatedAt
      });

      if (!result.written) {
        this.logger.warn({ serviceKey }, 'Skipped publish: existing config is newer (conditional check failed)');
        return finish('SKIPPED', { checksum, updatedAt, reason: 'stale' });
      }

      const unchanged = result.previousChecksum === checksum;
      this.logger.info(
        { serviceKey, version: result.record.version, unchanged },
        `Published autoscaling_configs for ${serviceKey} (checksum: ${checksum.slice(0, 12)}...)`
      );
      return finish('PUBLISHED', {
        published: true,
        checksum,
        updatedAt,
        version: result.record.version,
        unchanged
      });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ serviceKey, err: message }, 'Failed to publish autoscaling config; deploy continues');
      return finish('PUBLISH_FAILED', { checksum, updatedAt, errors: [message] });
    }
  }
}
