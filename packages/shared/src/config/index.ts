/**
 * Configuration validation module
 *
 * Provides runtime validation for environment variables with
 * type safety, format validation, and helpful error messages.
 */

import { createLogger } from '../logger/index';

const log = createLogger({ name: 'changegate:config' });

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  value?: string;
  error?: string;
}

/** Configuration value types */
export type ConfigType = 'string' | 'number' | 'path';

/** Configuration field definition */
export interface ConfigField {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: ConfigType;
  /** Whether the field is required */
  required: boolean;
  /** Default value if not provided */
  default?: string;
  /** Custom validation function */
  validate?: (value: string) => ValidationResult;
  /** Description for error messages */
  description?: string;
}

/**
 * Validate a number
 */
export function validateNumber(
  value: string,
  options?: { min?: number; max?: number }
): ValidationResult {
  const num = Number.parseInt(value, 10);
  if (Number.isNaN(num) || !/^-?\d+$/.test(value.trim())) {
    return { valid: false, error: `Invalid number: ${value}` };
  }
  if (options?.min !== undefined && num < options.min) {
    return { valid: false, error: `Value ${num} is less than minimum ${options.min}` };
  }
  if (options?.max !== undefined && num > options.max) {
    return { valid: false, error: `Value ${num} is greater than maximum ${options.max}` };
  }
  return { valid: true, value };
}

/**
 * Validate a file path (basic check)
 */
export function validatePath(value: string): ValidationResult {
  if (value.length === 0) {
    return { valid: false, error: 'Path cannot be empty' };
  }
  if (value.includes('\0')) {
    return { valid: false, error: 'Path cannot contain null bytes' };
  }
  return { valid: true, value };
}

/**
 * Get an environment variable with validation
 */
export function getEnv(field: ConfigField, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[field.name];

  if (value === undefined || value === '') {
    if (field.required && field.default === undefined) {
      throw new Error(
        `Missing required environment variable: ${field.name}` +
          (field.description !== undefined ? ` (${field.description})` : '')
      );
    }
    if (field.default !== undefined) {
      log.debug({ name: field.name, default: field.default }, 'Using default config value');
      return field.default;
    }
    return '';
  }

  let result: ValidationResult = { valid: true, value };

  switch (field.type) {
    case 'number':
      result = validateNumber(value);
      break;
    case 'path':
      result = validatePath(value);
      break;
    case 'string':
    default:
      break;
  }

  if (result.valid && field.validate !== undefined) {
    result = field.validate(value);
  }

  if (!result.valid) {
    throw new Error(
      `Invalid value for ${field.name}: ${result.error ?? 'validation failed'}` +
        (field.description !== undefined ? ` (${field.description})` : '')
    );
  }

  return value;
}

/**
 * Parse integer from environment variable
 */
export function parseIntValue(value: string, fallback: number): number {
  const num = Number.parseInt(value, 10);
  return Number.isNaN(num) ? fallback : num;
}

/**
 * Validate all configuration at startup and log warnings
 */
export function validateConfig(
  fields: ConfigField[],
  env: NodeJS.ProcessEnv = process.env,
): Map<string, string> {
  const config = new Map<string, string>();
  const errors: string[] = [];

  for (const field of fields) {
    try {
      const value = getEnv(field, env);
      config.set(field.name, value);

      if (value === '' && !field.required) {
        log.warn({ name: field.name }, 'Config value is empty (using default or blank)');
      }
    } catch (err) {
      errors.push(err instanceof Error ? err.message : String(err));
    }
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n  - ${errors.join('\n  - ')}`);
  }

  return config;
}

// =============================================================================
// Engine Configuration
// =============================================================================

export interface EngineConfig {
  databasePath: string;
  scanConcurrency: number;
  maxArtifactBytes: number;
  /** Empty when the bundled default rule catalog should be used */
  rulesPath: string;
}

export const ENGINE_CONFIG_FIELDS: ConfigField[] = [
  {
    name: 'DATABASE_PATH',
    type: 'path',
    required: false,
    default: './changegate.db',
    description: 'SQLite ledger file path',
  },
  {
    name: 'SCAN_CONCURRENCY',
    type: 'number',
    required: false,
    default: '4',
    validate: (val) => validateNumber(val, { min: 1, max: 64 }),
    description: 'Number of artifacts or claims analysed concurrently',
  },
  {
    name: 'MAX_ARTIFACT_BYTES',
    type: 'number',
    required: false,
    default: '500000',
    validate: (val) => validateNumber(val, { min: 1 }),
    description: 'Artifacts larger than this are reported as analysis_incomplete',
  },
  {
    name: 'RULES_PATH',
    type: 'string',
    required: false,
    description: 'JSON rule catalog used by the finding classifier',
  },
];

/**
 * Load and validate the engine configuration from the environment.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const config = validateConfig(ENGINE_CONFIG_FIELDS, env);

  return {
    databasePath: config.get('DATABASE_PATH') ?? './changegate.db',
    scanConcurrency: parseIntValue(config.get('SCAN_CONCURRENCY') ?? '4', 4),
    maxArtifactBytes: parseIntValue(config.get('MAX_ARTIFACT_BYTES') ?? '500000', 500000),
    rulesPath: config.get('RULES_PATH') ?? '',
  };
}
