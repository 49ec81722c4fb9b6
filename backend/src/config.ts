/**
 * Engine Configuration
 *
 * Resolves the config directory holding cards.json and progress.json, and
 * loads the optional settings.json that tunes the box schedule, the stats
 * time zone and the completion message.
 */

import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { formatValidationError } from "@decouvertes/shared";
import { ConfigurationError, fail, ok, type Result } from "./errors.js";
import { createLogger } from "./logger.js";
import { DEFAULT_BOX_COUNT, geometricBoxWeights } from "./leitner/box-weights.js";

const log = createLogger("Config");

// =============================================================================
// Constants
// =============================================================================

/**
 * Config directory relative to the user's home.
 */
const CONFIG_DIR = ".config/decouvertes";

export const CARDS_FILE = "cards.json";
export const PROGRESS_FILE = "progress.json";
export const SETTINGS_FILE = "settings.json";

export const DEFAULT_COMPLETION_MESSAGE = "Congratulations, you have mastered all cards!";

// =============================================================================
// Paths
// =============================================================================

export interface DataPaths {
  configDir: string;
  cardsPath: string;
  progressPath: string;
  settingsPath: string;
}

/**
 * Get the config directory.
 *
 * DECOUVERTES_CONFIG_DIR wins; otherwise HOME (so tests can override it)
 * and finally os.homedir().
 */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DECOUVERTES_CONFIG_DIR) {
    return env.DECOUVERTES_CONFIG_DIR;
  }
  const home = env.HOME ?? homedir();
  return join(home, CONFIG_DIR);
}

export function getDataPaths(configDir: string): DataPaths {
  return {
    configDir,
    cardsPath: join(configDir, CARDS_FILE),
    progressPath: join(configDir, PROGRESS_FILE),
    settingsPath: join(configDir, SETTINGS_FILE),
  };
}

/**
 * Fails with a ConfigurationError unless the config directory exists.
 */
export async function ensureConfigDir(paths: DataPaths): Promise<Result<void>> {
  try {
    const info = await stat(paths.configDir);
    if (info.isDirectory()) {
      return ok(undefined);
    }
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code !== "ENOENT") {
      throw e;
    }
  }
  return fail(
    new ConfigurationError(
      `Config directory not found at ${paths.configDir}. ` +
        `Please create it and place your '${CARDS_FILE}' file inside.`
    )
  );
}

// =============================================================================
// Settings
// =============================================================================

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Schema for settings.json. Every field is optional.
 */
export const SettingsFileSchema = z.object({
  /** Number of review boxes; weights default to 2^(boxCount - box) */
  boxCount: z.number().int().min(1).max(30).optional(),
  /** Explicit weight per box, box 1 first; overrides boxCount */
  boxWeights: z.array(z.number().int().positive()).min(1).optional(),
  /** IANA time zone used to bucket history into calendar days */
  timeZone: z.string().refine(isValidTimeZone, "Unknown time zone").optional(),
  /** Prompt of the get-card sentinel once nothing is left to review */
  completionMessage: z.string().min(1).optional(),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

/**
 * Resolved engine settings.
 */
export interface LeitnerSettings {
  boxWeights: number[];
  timeZone: string;
  completionMessage: string;
}

export function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function resolveSettings(file: SettingsFile = {}): LeitnerSettings {
  return {
    boxWeights: file.boxWeights ?? geometricBoxWeights(file.boxCount ?? DEFAULT_BOX_COUNT),
    timeZone: file.timeZone ?? localTimeZone(),
    completionMessage: file.completionMessage ?? DEFAULT_COMPLETION_MESSAGE,
  };
}

/**
 * Loads settings.json if it exists.
 *
 * A missing file means defaults. An unreadable or invalid file is logged and
 * also falls back to defaults.
 */
export async function loadSettings(paths: DataPaths): Promise<LeitnerSettings> {
  let content: string;
  try {
    content = await readFile(paths.settingsPath, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      return resolveSettings();
    }
    const message = e instanceof Error ? e.message : String(e);
    log.warn(`Failed to read settings from ${paths.settingsPath}: ${message}`);
    return resolveSettings();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    log.warn(`Invalid JSON in ${paths.settingsPath}, using default settings`);
    return resolveSettings();
  }

  const result = SettingsFileSchema.safeParse(parsed);
  if (!result.success) {
    log.warn(formatValidationError(result.error, `settings in ${paths.settingsPath}`));
    return resolveSettings();
  }

  return resolveSettings(result.data);
}
