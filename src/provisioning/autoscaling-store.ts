import { DynamoDBClient, DescribeTableCommand } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { AutoscalingPublishError, errorMessage, isNamedError } from '../errors.js';
import { getComponentLogger } from '../utils/logging.js';
import type {
  AutoscalingRecordInput,
  AutoscalingStore,
  AwsClientOptions,
  ConditionalWriteResult
} from './types.js';

// Attributes written on every publish, besides the key and the version counter
const RECORD_FIELDS = ['env', 'config', 'checksum', 'commit_sha', 'updated_at'] as const;

/**
 * Autoscaling records in the `{cluster}_ecs_autoscaling_config` DynamoDB table
 */
export class DynamoDbAutoscalingStore implements AutoscalingStore {
  private client: DynamoDBClient;
  private docClient: DynamoDBDocumentClient;
  private logger = getComponentLogger('autoscaling-store');

  constructor(
    readonly tableName: string,
    options: AwsClientOptions
  ) {
    this.client = new DynamoDBClient({
      region: options.region,
      maxAttempts: options.maxAttempts,
      retryMode: options.retryMode
    });
    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: { removeUndefinedValues: true }
    });
  }

  async tableExists(): Promise<boolean> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
      return true;
    } catch (error) {
      if (isNamedError(error, 'ResourceNotFoundException')) {
        return false;
      }
      throw new AutoscalingPublishError(`Failed to describe table ${this.tableName}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  /**
   * Single conditional update: the record is written only when it does not exist yet
   * or its stored `updated_at` is not newer than ours. The version counter is bumped atomically.
   */
  async putIfNotNewer(record: AutoscalingRecordInput): Promise<ConditionalWriteResult> {
    const names: Record<string, string> = { '#service_key': 'service_key', '#version': 'version' };
    const values: Record<string, unknown> = { ':one': 1 };
    const assignments: string[] = [];

    for (const field of RECORD_FIELDS) {
      names[`#${field}`] = field;
      values[`:${field}`] = record[field];
      assignments.push(`#${field} = :${field}`);
    }

    try {
      const response = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { service_key: record.service_key },
          UpdateExpression: `SET ${assignments.join(', ')} ADD #version :one`,
          ConditionExpression: 'attribute_not_exists(#service_key) OR #updated_at <= :updated_at',
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_OLD'
        })
      );

      // Items written by other tools may lack fields, so only the two read back are checked
      const previousVersion = response.Attributes?.version;
      const previousChecksum = response.Attributes?.checksum;
      const version = (typeof previousVersion === 'number' ? previousVersion : 0) + 1;
      this.logger.debug({ serviceKey: record.service_key, version }, 'Autoscaling record written');
      return {
        written: true,
        record: { ...record, version },
        ...(typeof previousChecksum === 'string' ? { previousChecksum } : {})
      };
    } catch (error) {
      if (isNamedError(error, 'ConditionalCheckFailedException')) {
        return { written: false, reason: 'stale' };
      }
      throw new AutoscalingPublishError(`DynamoDB publish failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
