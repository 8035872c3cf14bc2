import { ConfigError } from '../errors.js';

export type RawDocument = Record<string, unknown>;

export const OVERRIDES_KEY = 'services_overrides';

export function isPlainObject(value: unknown): value is RawDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply one override layer on top of a base document.
 *
 * - scalar: override replaces base
 * - array: base entries followed by override entries, no dedup
 * - object: override replaces base wholesale (never deep-merged)
 * - null: key is removed from the result
 */
export function mergeServiceOverride(base: RawDocument, override: RawDocument): RawDocument {
  const result: RawDocument = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === null) {
      delete result[key];
      continue;
    }

    const current = result[key];
    if (Array.isArray(value) && Array.isArray(current)) {
      result[key] = [...current, ...value];
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Resolve the document for one service or task.
 * When the document declares `services_overrides`, the selector must match either
 * the top-level `name` or one of the override keys.
 */
export function resolveServiceDocument(document: RawDocument, selector?: string): RawDocument {
  const { [OVERRIDES_KEY]: overrides, ...base } = document;

  if (overrides === undefined || overrides === null) {
    return base;
  }

  if (!isPlainObject(overrides)) {
    throw new ConfigError(`Invalid ${OVERRIDES_KEY}: must be a mapping of service name to partial configuration`);
  }

  if (selector === undefined || selector === '') {
    return base;
  }

  if (!Object.prototype.hasOwnProperty.call(overrides, selector)) {
    if (base.name === selector) {
      return base;
    }
    const known = Object.keys(overrides).join(', ');
    throw new ConfigError(
      `Service "${selector}" is neither the top-level name nor declared in ${OVERRIDES_KEY} (declared: ${known || 'none'})`
    );
  }

  const override = overrides[selector];
  if (override === null || override === undefined) {
    return base;
  }
  if (!isPlainObject(override)) {
    throw new ConfigError(`Invalid ${OVERRIDES_KEY}.${selector}: must be a mapping`);
  }

  return mergeServiceOverride(base, override);
}
