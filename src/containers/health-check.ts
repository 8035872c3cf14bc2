import type { HealthCheck } from '@aws-sdk/client-ecs';
import type { HealthCheckConfig } from '../types/index.js';

const COMMAND_PREFIXES = ['CMD', 'CMD-SHELL', 'NONE'];

export const HEALTH_CHECK_DEFAULTS = {
  interval: 30,
  timeout: 5,
  retries: 3,
  startPeriod: 10
} as const;

/** A string runs through the shell; a bare vector is executed directly. */
export function normalizeHealthCommand(command: string | string[]): string[] {
  if (typeof command === 'string') {
    return ['CMD-SHELL', command];
  }
  if (COMMAND_PREFIXES.includes(command[0])) {
    return [...command];
  }
  return ['CMD', ...command];
}

/**
 * @returns undefined when no command is configured
 */
export function buildHealthCheck(config: HealthCheckConfig | undefined): HealthCheck | undefined {
  const command = config?.command;
  if (command === undefined || command.length === 0 || (typeof command === 'string' && command.trim() === '')) {
    return undefined;
  }

  return {
    command: normalizeHealthCommand(command),
    interval: config?.interval ?? HEALTH_CHECK_DEFAULTS.interval,
    timeout: config?.timeout ?? HEALTH_CHECK_DEFAULTS.timeout,
    retries: config?.retries ?? HEALTH_CHECK_DEFAULTS.retries,
    startPeriod: config?.start_period ?? HEALTH_CHECK_DEFAULTS.startPeriod
  };
}
