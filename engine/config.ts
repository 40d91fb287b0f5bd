// engine/config.ts
// Canonical config for the BOM lookup engine.

import { ErrorCodes } from './errorCodes';
import { ValidationError } from './errors';

export interface NormalizerConfig {
  /** Every character in this string is treated as punctuation. */
  punctuation: string;
}

export interface RiskThresholds {
  highDuplicateRate: number;
  highUpdateRate: number;
  mediumDuplicateRate: number;
  mediumInsertRate: number;
}

export interface StorageConfig {
  tablesPrefix: string;
  maxTableAgeHours: number;
  token?: string;
}

export interface PreviewConfig {
  sheetRows: number;
  cleanRows: number;
  lookupRows: number;
  duplicateRows: number;
}

export interface EngineConfig {
  name: string;
  normalizer: NormalizerConfig;
  risk: RiskThresholds;
  suggestionLimit: number;
  /** Column written by lookups run through the service. */
  statusColumn: string;
  lookupColumnRange: { start: number; end: number };
  preview: PreviewConfig;
  storage: StorageConfig;
}

export const DEFAULT_PUNCTUATION = `-_./\\,;:'"+*#()[]{}|!?&`;

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  highDuplicateRate: 0.1,
  highUpdateRate: 0.5,
  mediumDuplicateRate: 0.02,
  mediumInsertRate: 0.3
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  name: 'default',
  normalizer: {
    punctuation: DEFAULT_PUNCTUATION
  },
  risk: DEFAULT_RISK_THRESHOLDS,
  suggestionLimit: 5,
  statusColumn: 'LOOKUP_STATUS',
  lookupColumnRange: { start: 1, end: 22 },
  preview: {
    sheetRows: 5,
    cleanRows: 5,
    lookupRows: 20,
    duplicateRows: 10
  },
  storage: {
    tablesPrefix: 'bom-etl/tables/',
    maxTableAgeHours: 24
  }
};

type Env = Record<string, string | undefined>;

function readRate(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(
      ErrorCodes.INVALID_CONFIG_VALUE,
      `${name} must be a number between 0 and 1, got "${raw}".`,
      { details: { name, raw } }
    );
  }
  return value;
}

function readCount(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      ErrorCodes.INVALID_CONFIG_VALUE,
      `${name} must be a non-negative integer, got "${raw}".`,
      { details: { name, raw } }
    );
  }
  return value;
}

function readText(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw === '' ? fallback : raw;
}

/**
 * Build the effective config from environment overrides on top of DEFAULT_ENGINE_CONFIG.
 * Unknown variables are ignored; malformed ones fail with E105.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;

  return {
    name: readText(env, 'BOM_CONFIG_NAME', base.name),
    normalizer: {
      punctuation: readText(env, 'BOM_NORMALIZER_PUNCTUATION', base.normalizer.punctuation)
    },
    risk: {
      highDuplicateRate: readRate(env, 'BOM_RISK_HIGH_DUPLICATE_RATE', base.risk.highDuplicateRate),
      highUpdateRate: readRate(env, 'BOM_RISK_HIGH_UPDATE_RATE', base.risk.highUpdateRate),
      mediumDuplicateRate: readRate(env, 'BOM_RISK_MEDIUM_DUPLICATE_RATE', base.risk.mediumDuplicateRate),
      mediumInsertRate: readRate(env, 'BOM_RISK_MEDIUM_INSERT_RATE', base.risk.mediumInsertRate)
    },
    suggestionLimit: readCount(env, 'BOM_SUGGESTION_LIMIT', base.suggestionLimit),
    statusColumn: readText(env, 'BOM_STATUS_COLUMN', base.statusColumn),
    lookupColumnRange: { ...base.lookupColumnRange },
    preview: { ...base.preview },
    storage: {
      tablesPrefix: readText(env, 'BOM_TABLES_PREFIX', base.storage.tablesPrefix),
      maxTableAgeHours: readCount(env, 'BOM_TABLE_MAX_AGE_HOURS', base.storage.maxTableAgeHours),
      token: env.BLOB_READ_WRITE_TOKEN || undefined
    }
  };
}
