/**
 * Configuration loading and validation
 *
 * Loads ~/.config/timetree/config.yaml (or TIMETREE_CONFIG_PATH), then applies
 * environment overrides: TIMETREE_DB_PATH, TIMETREE_LOG_LEVEL.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import type { TimeTreeConfig, TimeTreeSettings } from '../types/index.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Zod schema for the settings section
const settingsSchema = z.object({
  log_level: logLevelSchema.default('warn'),
  db_path: z.string().min(1).optional(),
  week_days: z.number().int().min(1).max(7).default(5),
  bar_width: z.number().int().min(5).max(200).default(40),
});

// Zod schema for the complete config file
const configFileSchema = z.object({
  version: z.number().default(1),
  settings: settingsSchema.default({}),
});

// Environment variable schema
const envSchema = z.object({
  TIMETREE_CONFIG_PATH: z.string().min(1).optional(),
  TIMETREE_DB_PATH: z.string().min(1).optional(),
  TIMETREE_LOG_LEVEL: logLevelSchema.optional(),
  XDG_DATA_HOME: z.string().optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'timetree', 'config.yaml');
}

/**
 * Default database location, following the XDG data directory
 */
export function getDefaultDbPath(xdgDataHome?: string): string {
  const base = xdgDataHome ?? join(homedir(), '.local', 'share');
  return join(base, 'timetree', 'timetree.sqlite');
}

/**
 * Read and validate the settings file; a missing file yields the defaults
 */
export function loadSettings(configPath: string): TimeTreeSettings {
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}, using defaults`);
    return settingsSchema.parse({});
  }

  const content = readFileSync(configPath, 'utf-8');
  const raw: unknown = parseYaml(content) ?? {};
  const result = configFileSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Invalid config ${configPath}:\n${formatIssues(result.error)}`);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return result.data.settings;
}

/**
 * Load configuration from file and environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimeTreeConfig {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new Error(`Configuration error:\n${formatIssues(envResult.error)}`);
  }
  const vars = envResult.data;

  const configPath = resolve(vars.TIMETREE_CONFIG_PATH ?? getDefaultConfigPath());
  const settings = loadSettings(configPath);

  const dbPath = vars.TIMETREE_DB_PATH ?? settings.db_path ?? getDefaultDbPath(vars.XDG_DATA_HOME || undefined);

  return {
    dbPath: dbPath === ':memory:' ? dbPath : resolve(dbPath),
    logLevel: vars.TIMETREE_LOG_LEVEL ?? settings.log_level,
    weekDays: settings.week_days,
    barWidth: settings.bar_width,
    configPath,
  };
}

// Singleton config instance
let configInstance: TimeTreeConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): TimeTreeConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Replace individual values of the cached config (CLI flags)
 */
export function overrideConfig(overrides: Partial<TimeTreeConfig>): TimeTreeConfig {
  configInstance = { ...getConfig(), ...overrides };
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export schemas for testing
export const schemas = {
  settings: settingsSchema,
  configFile: configFileSchema,
  env: envSchema,
};
