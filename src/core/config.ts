/**
 * Registry configuration: defaults, then environment, then explicit overrides.
 * The merged object is validated (and env strings coerced) by a JSON schema.
 */

import AjvModule from 'ajv';
import { LOG_LEVEL_NAMES, type LogLevelName } from './logger.js';
import type { Result } from './types.js';

const Ajv = AjvModule.default;

export type StorageKind = 'memory' | 'sqlite';

export interface ClaimRegistryConfig {
  /** Maximum fingerprint length in bytes */
  proofLimit: number;
  storage: StorageKind;
  /** SQLite file path, or ':memory:' */
  databasePath: string;
  logLevel: LogLevelName;
}

export const DEFAULT_PROOF_LIMIT = 256;

const ENV_VARS: Record<keyof ClaimRegistryConfig, string> = {
  proofLimit: 'CLAIMS_PROOF_LIMIT',
  storage: 'CLAIMS_STORAGE',
  databasePath: 'CLAIMS_DB_PATH',
  logLevel: 'CLAIMS_LOG_LEVEL',
};

const CONFIG_SCHEMA = {
  type: 'object',
  properties: {
    proofLimit: { type: 'integer', minimum: 0, maximum: 4294967295, default: DEFAULT_PROOF_LIMIT },
    storage: { type: 'string', enum: ['memory', 'sqlite'], default: 'memory' },
    databasePath: { type: 'string', minLength: 1, default: ':memory:' },
    logLevel: { type: 'string', enum: [...LOG_LEVEL_NAMES], default: 'info' },
  },
  required: ['proofLimit', 'storage', 'databasePath', 'logLevel'],
  additionalProperties: false,
};

const ajv = new Ajv({ useDefaults: true, coerceTypes: true, allErrors: true });
const validateConfig = ajv.compile<ClaimRegistryConfig>(CONFIG_SCHEMA);

/**
 * Build a configuration from `CLAIMS_*` environment variables and overrides.
 * Unset values fall back to the defaults; unknown override keys are rejected.
 */
export function loadConfig(
  overrides: Partial<ClaimRegistryConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): Result<ClaimRegistryConfig, string> {
  const raw: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') raw[field] = value.trim();
  }
  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[field] = value;
  }

  if (!validateConfig(raw)) {
    return { ok: false, error: `Invalid configuration: ${ajv.errorsText(validateConfig.errors)}` };
  }
  return {
    ok: true,
    value: {
      proofLimit: raw.proofLimit,
      storage: raw.storage,
      databasePath: raw.databasePath,
      logLevel: raw.logLevel,
    },
  };
}
