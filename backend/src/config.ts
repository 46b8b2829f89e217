/**
 * Study Loop Configuration
 *
 * Settings come from three layers, later layers winning:
 * 1. Built-in defaults
 * 2. `study-loop.yaml` in the data directory
 * 3. STUDY_LOOP_* environment variables
 *
 * Invalid files or values log a warning and fall back to the layer below.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { hasErrorCode } from "./fs-utils.js";
import { createLogger } from "./logger.js";

const log = createLogger("Config");

// =============================================================================
// Constants
// =============================================================================

/**
 * Config directory name within user home, used when no data dir is given.
 */
const DEFAULT_DATA_DIR = ".config/study-loop";

/**
 * Config file name inside the data directory.
 */
export const CONFIG_FILE_NAME = "study-loop.yaml";

/**
 * Estimated seconds spent per card when closing an abandoned session.
 */
export const DEFAULT_SECONDS_PER_CARD = 30;

/**
 * Longest question or answer accepted from a deck line.
 */
export const DEFAULT_MAX_FIELD_LENGTH = 1000;

// =============================================================================
// Schema
// =============================================================================

export const StorageKindSchema = z.enum(["sqlite", "file"]);

const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(3000),
  host: z.string().min(1).default("127.0.0.1"),
});

/**
 * Schema for study-loop.yaml. File paths are relative to the data directory
 * unless absolute.
 */
export const StudyLoopConfigSchema = z.object({
  /** Which backend to persist to */
  storage: StorageKindSchema.default("sqlite"),
  /** SQLite database file */
  databaseFile: z.string().min(1).default("study-loop.db"),
  /** File-backend review state document (also the legacy migration source) */
  reviewStateFile: z.string().min(1).default("review-state.json"),
  /** File-backend statistics document (also the legacy migration source) */
  statsFile: z.string().min(1).default("study-stats.json"),
  /** Seconds per reviewed card assumed when recovering an orphan session */
  orphanSecondsPerCard: z.number().int().min(1).max(3600).default(DEFAULT_SECONDS_PER_CARD),
  /** Maximum length of a question or answer parsed from a deck */
  maxFieldLength: z.number().int().min(1).default(DEFAULT_MAX_FIELD_LENGTH),
  /** Deck loaded at startup, if present */
  sampleDeck: z.string().min(1).optional(),
  server: ServerConfigSchema.default({}),
});

export type StorageKind = z.infer<typeof StorageKindSchema>;
export type StudyLoopConfig = z.infer<typeof StudyLoopConfigSchema>;

/**
 * Configuration with every path resolved to an absolute location.
 */
export interface ResolvedConfig {
  dataDir: string;
  storage: StorageKind;
  databasePath: string;
  reviewStatePath: string;
  statsPath: string;
  orphanSecondsPerCard: number;
  maxFieldLength: number;
  sampleDeck: string | null;
  server: { port: number; host: string };
}

export interface LoadConfigOptions {
  /** Data directory; defaults to STUDY_LOOP_DATA_DIR or ~/.config/study-loop */
  dataDir?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Get the data directory, honoring STUDY_LOOP_DATA_DIR.
 * Checks HOME first (allows tests to override), then os.homedir().
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.STUDY_LOOP_DATA_DIR) {
    return env.STUDY_LOOP_DATA_DIR;
  }
  const home = env.HOME ?? homedir();
  return join(home, DEFAULT_DATA_DIR);
}

/**
 * Read and validate study-loop.yaml. Returns defaults when it is missing or invalid.
 */
export async function readConfigFile(dataDir: string): Promise<StudyLoopConfig> {
  const configPath = join(dataDir, CONFIG_FILE_NAME);
  const defaults = StudyLoopConfigSchema.parse({});

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (e) {
    if (hasErrorCode(e, "ENOENT")) {
      log.debug(`No config file at ${configPath}, using defaults`);
      return defaults;
    }
    throw e;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.warn(`Invalid YAML in ${configPath}, using defaults: ${message}`);
    return defaults;
  }

  // An empty file parses to undefined
  const result = StudyLoopConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    log.warn(`Invalid config schema at ${configPath}, using defaults`, result.error.issues);
    return defaults;
  }

  return result.data;
}

function parseIntEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  min: number,
  max: number
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    log.warn(`Invalid ${name}: ${raw}, ignoring`);
    return undefined;
  }
  return value;
}

/**
 * Apply STUDY_LOOP_* environment overrides on top of file settings.
 */
export function applyEnvOverrides(
  config: StudyLoopConfig,
  env: NodeJS.ProcessEnv
): StudyLoopConfig {
  const next: StudyLoopConfig = { ...config, server: { ...config.server } };

  if (env.STUDY_LOOP_STORAGE) {
    const storage = StorageKindSchema.safeParse(env.STUDY_LOOP_STORAGE);
    if (storage.success) {
      next.storage = storage.data;
    } else {
      log.warn(`Invalid STUDY_LOOP_STORAGE: ${env.STUDY_LOOP_STORAGE}, ignoring`);
    }
  }

  if (env.STUDY_LOOP_DB_FILE) {
    next.databaseFile = env.STUDY_LOOP_DB_FILE;
  }

  if (env.STUDY_LOOP_SAMPLE_DECK) {
    next.sampleDeck = env.STUDY_LOOP_SAMPLE_DECK;
  }

  if (env.STUDY_LOOP_HOST) {
    next.server.host = env.STUDY_LOOP_HOST;
  }

  const port = parseIntEnv(env, "STUDY_LOOP_PORT", 0, 65535);
  if (port !== undefined) {
    next.server.port = port;
  }

  const secondsPerCard = parseIntEnv(env, "STUDY_LOOP_SECONDS_PER_CARD", 1, 3600);
  if (secondsPerCard !== undefined) {
    next.orphanSecondsPerCard = secondsPerCard;
  }

  return next;
}

function resolvePath(dataDir: string, path: string): string {
  return isAbsolute(path) ? path : join(dataDir, path);
}

/**
 * Load the effective configuration.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const dataDir = options.dataDir ?? getDataDir(env);

  const fileConfig = await readConfigFile(dataDir);
  const config = applyEnvOverrides(fileConfig, env);

  return {
    dataDir,
    storage: config.storage,
    databasePath: resolvePath(dataDir, config.databaseFile),
    reviewStatePath: resolvePath(dataDir, config.reviewStateFile),
    statsPath: resolvePath(dataDir, config.statsFile),
    orphanSecondsPerCard: config.orphanSecondsPerCard,
    maxFieldLength: config.maxFieldLength,
    sampleDeck: config.sampleDeck ?? null,
    server: config.server,
  };
}
