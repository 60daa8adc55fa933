import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import { ConfigError } from '../types/errors';
import type { ReadPosition } from '../types/record';

const ajv = new Ajv({ allErrors: true });

// ── Schemas ─────────────────────────────────────────────────────

export const validateReadPosition: ValidateFunction<ReadPosition> = ajv.compile<ReadPosition>({
  type: 'object',
  properties: {
    filename: { type: 'string', minLength: 1 },
    index: { type: 'integer', minimum: 0 },
  },
  required: ['filename', 'index'],
  additionalProperties: false,
});

export const validateVars: ValidateFunction<Record<string, string>> = ajv.compile<Record<string, string>>({
  type: 'object',
  additionalProperties: { type: 'string' },
});

/** Plain-data part of project options; collaborators (codec, events, clock) are not checked. */
export const validateProjectSettings = ajv.compile<{ rotationIntervalMs?: number; syncOnWrite?: boolean }>({
  type: 'object',
  properties: {
    rotationIntervalMs: { type: 'integer', minimum: 1 },
    syncOnWrite: { type: 'boolean' },
  },
});

/** Plain-data part of cache options. */
export const validateCacheSettings = ajv.compile<{ baseDir?: string; name?: string }>({
  type: 'object',
  properties: {
    baseDir: { type: 'string', minLength: 1 },
    name: { type: 'string', minLength: 1 },
  },
});

// ── Helpers ─────────────────────────────────────────────────────

export function formatIssues(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

/**
 * Throw ConfigError unless `value` passes `validate`.
 */
export function assertSettings<T>(validate: ValidateFunction<T>, value: unknown): void {
  if (!validate(value)) {
    throw new ConfigError(formatIssues(validate.errors));
  }
}
