/**
 * Configuration module for the SCR knowledge base
 *
 * Loads configuration from defaults, config files and environment variables
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

const ExtractionSchema = z.object({
  /** Hard cap on PDF pages read per document */
  maxPdfPages: z.number().int().positive(),

  /** Timeout of the single web fetch, in milliseconds */
  fetchTimeoutMs: z.number().int().positive(),

  /** Maximum links kept from a web page */
  maxLinks: z.number().int().nonnegative(),

  userAgent: z.string().min(1)
});

const ConfigSchema = z.object({
  /** Base directory for data storage */
  dataDir: z.string().min(1),

  /** SQLite database file */
  databasePath: z.string().min(1),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']),

  /** Also write logs to <dataDir>/logs */
  logToFile: z.boolean(),

  /** Local files above this size are ingested with a warning */
  maxFileSizeMb: z.number().positive(),

  extraction: ExtractionSchema
});

export type ScrKbConfig = z.infer<typeof ConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionSchema>;

const HOME_DIR = os.homedir();

export const GLOBAL_CONFIG_PATH = path.join(HOME_DIR, '.scrkb', 'config.json');
export const LOCAL_CONFIG_FILE = 'scrkb.config.json';

/**
 * Built-in defaults
 */
export function defaultConfig(dataDir: string = path.join(HOME_DIR, '.scrkb')): ScrKbConfig {
  return {
    dataDir,
    databasePath: path.join(dataDir, 'scr_knowledge.db'),
    logLevel: 'info',
    logToFile: false,
    maxFileSizeMb: 100,
    extraction: {
      maxPdfPages: 200,
      fetchTimeoutMs: 30000,
      maxLinks: 50,
      userAgent: 'SCR-KB/1.0 (Research Tool)'
    }
  };
}

type PartialConfig = Partial<Omit<ScrKbConfig, 'extraction'>> & {
  extraction?: Partial<ExtractionConfig>;
};

const PartialConfigSchema = ConfigSchema.partial().extend({
  extraction: ExtractionSchema.partial().optional()
});

// Function to load configuration from a file
function loadConfigFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`cannot read ${filePath}`, {
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid configuration in ${filePath}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function dropUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Environment variables, prefixed SCRKB_
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return dropUndefined({
    dataDir: env.SCRKB_DATA_DIR,
    databasePath: env.SCRKB_DB_PATH,
    logLevel: env.SCRKB_LOG_LEVEL,
    logToFile: parseBoolean(env.SCRKB_LOG_TO_FILE),
    maxFileSizeMb: parseNumber(env.SCRKB_MAX_FILE_SIZE_MB),
    extraction: dropUndefined({
      maxPdfPages: parseNumber(env.SCRKB_MAX_PDF_PAGES),
      fetchTimeoutMs: parseNumber(env.SCRKB_FETCH_TIMEOUT_MS),
      maxLinks: parseNumber(env.SCRKB_MAX_LINKS),
      userAgent: env.SCRKB_USER_AGENT
    })
  });
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Read a .env file from cwd first */
  useDotenv?: boolean;
  globalConfigPath?: string;
}

/**
 * Merge configurations with precedence:
 * default < global config file < local config file < environment variables
 */
export function loadConfig(options: LoadConfigOptions = {}): ScrKbConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.useDotenv ?? true) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }

  const fromEnv = loadConfigFromEnv(env);
  const envDataDir = typeof fromEnv.dataDir === 'string' ? fromEnv.dataDir : undefined;

  const globalConfig = loadConfigFromFile(options.globalConfigPath ?? GLOBAL_CONFIG_PATH);
  const localConfig = loadConfigFromFile(path.join(cwd, LOCAL_CONFIG_FILE));

  const dataDir = envDataDir ?? localConfig.dataDir ?? globalConfig.dataDir;
  const defaults = defaultConfig(dataDir);
  const envExtraction = isRecord(fromEnv.extraction) ? fromEnv.extraction : {};

  const merged = {
    ...defaults,
    ...globalConfig,
    ...localConfig,
    ...fromEnv,
    extraction: {
      ...defaults.extraction,
      ...globalConfig.extraction,
      ...localConfig.extraction,
      ...envExtraction
    }
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`invalid value for '${issue.path.join('.')}': ${issue.message}`, {
      issues: parsed.error.issues
    });
  }
  return parsed.data;
}

/**
 * Create the data and log directories
 */
export function ensureDirectories(config: ScrKbConfig): void {
  fs.mkdirSync(config.dataDir, { recursive: true });
  fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
  if (config.logToFile) {
    fs.mkdirSync(path.join(config.dataDir, 'logs'), { recursive: true });
  }
}
