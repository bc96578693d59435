/**
 * Config Schema Validator
 *
 * Validates runbox.json and merged environment configuration against
 * config.schema.json using Ajv. Schema defaults are applied in place, so a
 * merged config that validates carries every field the bootstrap reads.
 */

import * as fs from 'fs';
import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { EnvironmentConfig, EnvironmentSettings, RunboxConfig } from './config-types';

const configSchema: unknown = JSON.parse(
  fs.readFileSync(new URL('./config.schema.json', import.meta.url), 'utf-8')
);

const ajv = new Ajv({
  allErrors: true,
  coerceTypes: true,
  removeAdditional: false,
  useDefaults: true,
  strict: false
});

if (typeof configSchema !== 'object' || configSchema === null) {
  throw new Error('config.schema.json must contain a JSON object');
}
ajv.addSchema(configSchema, 'config');

export interface ValidationResult {
  valid: boolean;
  errors: ErrorObject[] | null;
  errorMessage?: string;
}

const validateRunbox: ValidateFunction<RunboxConfig> =
  ajv.compile<RunboxConfig>({ $ref: 'config#/definitions/RunboxConfig' });
const validateSettings: ValidateFunction<EnvironmentSettings> =
  ajv.compile<EnvironmentSettings>({ $ref: 'config#/definitions/EnvironmentSettings' });
const validateEnvironment: ValidateFunction<EnvironmentConfig> =
  ajv.compile<EnvironmentConfig>({ $ref: 'config#/definitions/EnvironmentConfig' });

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (!valid) {
    return {
      valid: false,
      errors: errors || null,
      errorMessage: formatErrors(errors || [])
    };
  }
  return { valid: true, errors: null };
}

/**
 * Validate runbox.json
 */
export function validateRunboxConfig(data: unknown): ValidationResult {
  const valid = validateRunbox(data);
  return toResult(valid, validateRunbox.errors);
}

/**
 * Validate one environment file, before it is merged over the defaults
 */
export function validateEnvironmentSettings(data: unknown): ValidationResult {
  const valid = validateSettings(data);
  return toResult(valid, validateSettings.errors);
}

/**
 * Type guard over the merged environment config. Applies schema defaults.
 */
export function isEnvironmentConfig(data: unknown): data is EnvironmentConfig {
  return validateEnvironment(data);
}

/**
 * Validate merged environment config
 */
export function validateEnvironmentConfig(data: unknown): ValidationResult {
  const valid = validateEnvironment(data);
  return toResult(valid, validateEnvironment.errors);
}

/**
 * Format validation errors into human-readable message
 */
export function formatErrors(errors: ErrorObject[]): string {
  if (errors.length === 0) return 'Validation failed';

  const messages = errors.map(err => {
    const path = err.instancePath || 'root';
    const message = err.message || 'validation error';

    if (err.keyword === 'required' && 'missingProperty' in err.params) {
      return `Missing required property: ${String(err.params.missingProperty)}`;
    }

    if (err.keyword === 'type' && 'type' in err.params) {
      return `${path}: ${message} (expected ${String(err.params.type)})`;
    }

    if (err.keyword === 'enum' && 'allowedValues' in err.params) {
      const allowed: unknown = err.params.allowedValues;
      return `${path}: must be one of [${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)}]`;
    }

    if (err.keyword === 'additionalProperties' && 'additionalProperty' in err.params) {
      return `${path}: unknown property '${String(err.params.additionalProperty)}'`;
    }

    return `${path}: ${message}`;
  });

  return messages.join('; ');
}
