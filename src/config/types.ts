// Configuration-specific types
import type { LoadedService } from '../types/index.js';

export interface ConfigValidationResult<T> {
  valid: boolean;
  errors: string[];
  value?: T;
}

export interface ConfigLoader {
  load(path: string, selector?: string): Promise<LoadedService>;
  validate(config: unknown): ConfigValidationResult<unknown>;
}
