import { appendFile } from 'fs/promises';
import type { PublishOutcome } from '../autoscaling/types.js';

export type AutoscalerOutputs = Record<
  'autoscaler_published' | 'autoscaler_service_key' | 'autoscaler_checksum' | 'autoscaler_updated_at',
  string
>;

/**
 * The four values reported to the calling workflow. Only a write attempt that reached
 * the table (published or skipped) reports its key, checksum and timestamp.
 */
export function autoscalerOutputs(outcome: PublishOutcome): AutoscalerOutputs {
  const attempted = outcome.state === 'PUBLISHED' || outcome.state === 'SKIPPED';
  return {
    autoscaler_published: String(outcome.published),
    autoscaler_service_key: attempted ? outcome.serviceKey : '',
    autoscaler_checksum: attempted ? outcome.checksum : '',
    autoscaler_updated_at: attempted ? String(outcome.updatedAt) : ''
  };
}

/** Reported when the publish command fails before it has an outcome. */
export function failedAutoscalerOutputs(): AutoscalerOutputs {
  return {
    autoscaler_published: 'false',
    autoscaler_service_key: '',
    autoscaler_checksum: '',
    autoscaler_updated_at: ''
  };
}

export function formatOutputs(outputs: Record<string, string>): string {
  return Object.entries(outputs)
    .map(([name, value]) => `${name}=${value}\n`)
    .join('');
}

/**
 * Append outputs to the workflow output file
 */
export async function writeGithubOutputs(outputs: Record<string, string>, file: string): Promise<void> {
  try {
    await appendFile(file, formatOutputs(outputs), 'utf-8');
  } catch (error) {
    throw new Error(`Failed to write outputs to ${file}: ${error}`);
  }
}

/**
 * Append outputs to the workflow output file when there is one, print them otherwise
 */
export async function emitOutputs(outputs: Record<string, string>, file: string | undefined): Promise<void> {
  if (file) {
    await writeGithubOutputs(outputs, file);
  } else {
    process.stdout.write(formatOutputs(outputs));
  }
}
