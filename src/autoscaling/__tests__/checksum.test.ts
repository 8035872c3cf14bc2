import { describe, it, expect } from 'vitest';
import {
  autoscalingTableName,
  buildServiceKey,
  canonicalJson,
  computeChecksum,
  withSchemaVersion
} from '../checksum.js';

const policy = {
  provider: { type: 'sqs', sqs: { queue_url: 'https://sqs.us-east-1.amazonaws.com/123456789012/orders-queue' } },
  min_tasks: 2,
  max_tasks: 50
};

describe('computeChecksum', () => {
  it('should return the same digest for the same policy', () => {
    const first = computeChecksum(policy);
    const second = computeChecksum(structuredClone(policy));

    expect(first).toMatch(/^[0-9a-f]{64}$/);
    expect(second).toBe(first);
  });

  it('should ignore key order', () => {
    const reordered = {
      max_tasks: 50,
      min_tasks: 2,
      provider: { sqs: { queue_url: policy.provider.sqs.queue_url }, type: 'sqs' }
    };

    expect(computeChecksum(reordered)).toBe(computeChecksum(policy));
  });

  it('should change when a value changes', () => {
    expect(computeChecksum({ ...policy, max_tasks: 60 })).not.toBe(computeChecksum(policy));
  });
});

describe('canonicalJson', () => {
  it('should sort keys at every depth and keep array order', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, 1], c: null } })).toBe('{"a":{"c":null,"d":[2,1]},"b":1}');
  });

  it('should sort keys inside arrays of objects', () => {
    expect(canonicalJson([{ z: 1, y: 2 }])).toBe('[{"y":2,"z":1}]');
  });
});

describe('withSchemaVersion', () => {
  it('should stamp the schema version without changing the input', () => {
    const input = { min_tasks: 1 };

    expect(withSchemaVersion(input)).toEqual({ min_tasks: 1, version: 1 });
    expect(input).toEqual({ min_tasks: 1 });
  });
});

describe('naming', () => {
  it('should build the record key from environment, cluster and service', () => {
    expect(buildServiceKey('prod', 'main', 'api')).toBe('prod:main:api');
  });

  it('should name the table after the cluster', () => {
    expect(autoscalingTableName('main')).toBe('main_ecs_autoscaling_config');
  });
});
