import {
  SecretsManagerClient,
  GetSecretValueCommand,
  DescribeSecretCommand
} from '@aws-sdk/client-secrets-manager';
import { SecretResolutionError, isNamedError } from '../errors.js';
import { isPlainObject } from '../config/merge.js';
import type { DiscoveredSecret, SecretKeyDiscovery } from '../secrets/types.js';
import { getComponentLogger } from '../utils/logging.js';
import type { AwsClientOptions } from './types.js';

/**
 * Secret key discovery backed by AWS Secrets Manager
 */
export class SecretsManagerKeyDiscovery implements SecretKeyDiscovery {
  private client: SecretsManagerClient;
  private logger = getComponentLogger('secrets-manager');

  constructor(options: AwsClientOptions) {
    this.client = new SecretsManagerClient({
      region: options.region,
      maxAttempts: options.maxAttempts,
      retryMode: options.retryMode
    });
  }

  async discoverKeys(secretName: string): Promise<DiscoveredSecret> {
    const response = await this.send(secretName, () =>
      this.client.send(new GetSecretValueCommand({ SecretId: secretName }))
    );

    if (!response.ARN) {
      throw new SecretResolutionError(`Secret '${secretName}' returned no ARN`, secretName);
    }
    if (response.SecretString === undefined) {
      throw new SecretResolutionError(`Secret '${secretName}' has no string value to read keys from`, secretName);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.SecretString);
    } catch (error) {
      throw new SecretResolutionError(`Secret '${secretName}' does not contain valid JSON`, secretName, {
        cause: error
      });
    }
    if (!isPlainObject(parsed)) {
      throw new SecretResolutionError(`Secret '${secretName}' does not contain a JSON object`, secretName);
    }

    const keys = Object.keys(parsed);
    this.logger.debug({ secretName, arn: response.ARN, keyCount: keys.length }, 'Discovered secret keys');
    return { arn: response.ARN, keys };
  }

  async resolveArn(secretName: string): Promise<string> {
    const response = await this.send(secretName, () =>
      this.client.send(new DescribeSecretCommand({ SecretId: secretName }))
    );
    if (!response.ARN) {
      throw new SecretResolutionError(`Secret '${secretName}' returned no ARN`, secretName);
    }
    return response.ARN;
  }

  private async send<T>(secretName: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isNamedError(error, 'ResourceNotFoundException')) {
        throw new SecretResolutionError(`Secret '${secretName}' not found`, secretName, { cause: error });
      }
      throw error;
    }
  }
}
