/**
 * Configuration Service
 *
 * Manages application configuration stored in ~/.bindery/config.json.
 * Environment variables take priority over the file for the settings
 * listed in ENV_VAR_MAP.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { BATCH_STRATEGIES } from '../types/catalog.types.js';
import { getConfigPath, ensureAppDirectories } from './app-paths.service.js';
import { logError, logWarn } from './logger.service.js';

// =============================================================================
// Schemas
// =============================================================================

const DatabaseSettingsSchema = z.object({
  /** Database file; defaults to ~/.bindery/bindery.db */
  path: z.string().min(1).optional(),
  busyTimeoutMs: z.number().int().nonnegative().default(5000),
  journalMode: z.enum(['WAL', 'DELETE', 'MEMORY']).default('WAL'),
});

const BatchSettingsSchema = z.object({
  defaultStrategy: z.enum(BATCH_STRATEGIES).default('transactional'),
  /** Rows per multi-row INSERT in the grouped strategy */
  chunkSize: z.number().int().min(1).max(500).default(100),
});

export const AppConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  database: DatabaseSettingsSchema.default({}),
  batch: BatchSettingsSchema.default({}),
});

// =============================================================================
// Type Definitions
// =============================================================================

export type DatabaseSettings = z.infer<typeof DatabaseSettingsSchema>;
export type BatchSettings = z.infer<typeof BatchSettingsSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// =============================================================================
// Configuration State
// =============================================================================

let cachedConfig: AppConfig | null = null;

function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Load configuration from disk
 * Returns cached config if available. A missing or invalid file yields defaults.
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    cachedConfig = defaultConfig();
    return cachedConfig;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed = AppConfigSchema.safeParse(JSON.parse(content));

    if (!parsed.success) {
      logWarn('config', 'Invalid configuration file, using defaults', {
        path: configPath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      cachedConfig = defaultConfig();
      return cachedConfig;
    }

    cachedConfig = parsed.data;
    return cachedConfig;
  } catch (error) {
    logError('config', error, { action: 'load-config' });
    cachedConfig = defaultConfig();
    return cachedConfig;
  }
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: AppConfig): void {
  ensureAppDirectories();
  const configPath = getConfigPath();

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
    cachedConfig = config;
  } catch (error) {
    logError('config', error, { action: 'save-config' });
    throw new Error(`Failed to save configuration: ${error}`);
  }
}

/**
 * Update configuration with partial values
 */
export function updateConfig(updates: {
  database?: Partial<DatabaseSettings>;
  batch?: Partial<BatchSettings>;
}): AppConfig {
  const current = loadConfig();
  const updated = AppConfigSchema.parse({
    version: current.version,
    database: { ...current.database, ...updates.database },
    batch: { ...current.batch, ...updates.batch },
  });
  saveConfig(updated);
  return updated;
}

/**
 * Clear cached config (for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

// =============================================================================
// Environment Overrides
// =============================================================================

export const ENV_VAR_MAP = {
  databasePath: 'BINDERY_DATABASE_PATH',
  batchStrategy: 'BINDERY_BATCH_STRATEGY',
  batchChunkSize: 'BINDERY_BATCH_CHUNK_SIZE',
} as const;

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

// =============================================================================
// Settings Accessors
// =============================================================================

/**
 * Get database settings, environment first
 */
export function getDatabaseSettings(): DatabaseSettings {
  const settings = loadConfig().database;
  const envPath = readEnv(ENV_VAR_MAP.databasePath);
  return envPath ? { ...settings, path: envPath } : settings;
}

/**
 * Get batch insert settings, environment first.
 * Invalid environment values are ignored with a warning.
 */
export function getBatchSettings(): BatchSettings {
  const settings = { ...loadConfig().batch };

  const envStrategy = readEnv(ENV_VAR_MAP.batchStrategy);
  if (envStrategy) {
    const strategy = BatchSettingsSchema.shape.defaultStrategy.safeParse(envStrategy);
    if (strategy.success) {
      settings.defaultStrategy = strategy.data;
    } else {
      logWarn('config', `Ignoring invalid ${ENV_VAR_MAP.batchStrategy}`, { value: envStrategy });
    }
  }

  const envChunkSize = readEnv(ENV_VAR_MAP.batchChunkSize);
  if (envChunkSize) {
    const chunkSize = z.coerce.number().int().min(1).max(500).safeParse(envChunkSize);
    if (chunkSize.success) {
      settings.chunkSize = chunkSize.data;
    } else {
      logWarn('config', `Ignoring invalid ${ENV_VAR_MAP.batchChunkSize}`, { value: envChunkSize });
    }
  }

  return settings;
}
