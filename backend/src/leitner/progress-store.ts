/**
 * Progress Store
 *
 * Reads and rewrites progress.json, the only mutable state of the engine.
 * A command loads the whole file once, works on the value in memory and
 * writes it back in full; there are no partial updates and no locking.
 *
 * Two shapes share the file name:
 * - multi-player: player id -> PlayerRecord
 * - single-player (older files, no players): card id -> ProgressEntry
 *
 * Output key order is stable: map keys sorted, record fields in declaration
 * order.
 */

import {
  type HistoryEvent,
  type LegacyProgress,
  type PlayerRecord,
  type ProgressCollection,
  type ProgressEntry,
  formatValidationError,
  safeParseLegacyProgress,
  safeParseProgressCollection,
} from "@decouvertes/shared";
import type { ZodError } from "zod";
import { MalformedDataError, fail, ok, type Result } from "../errors.js";
import { createLogger } from "../logger.js";
import { INITIAL_BOX } from "./box-weights.js";
import { parseJson, readTextFile, writeJsonFile } from "./data-files.js";

const log = createLogger("progress-store");

// =============================================================================
// Factories
// =============================================================================

/**
 * Entry for a card the player has just been shown for the first time.
 */
export function createProgressEntry(now: Date): ProgressEntry {
  return {
    box: INITIAL_BOX,
    streak: 0,
    passed: 0,
    failed: 0,
    last_reviewed: now.toISOString(),
  };
}

export function createEmptyCollection(): ProgressCollection {
  return {};
}

// =============================================================================
// Lookup
// =============================================================================

/**
 * Entry stored under a card id. Only own keys count, so ids such as
 * "constructor" or "__proto__" never resolve to Object.prototype members.
 */
export function findProgressEntry(
  cards: Record<string, ProgressEntry>,
  cardId: string
): ProgressEntry | undefined {
  return Object.hasOwn(cards, cardId) ? cards[cardId] : undefined;
}

// =============================================================================
// Reading
// =============================================================================

type SafeParse<T> = (
  data: unknown
) => { success: true; data: T } | { success: false; error: ZodError };

async function readProgressFile<T>(
  path: string,
  parse: SafeParse<T>,
  empty: () => T,
  subject: string
): Promise<Result<T>> {
  const content = await readTextFile(path);
  if (content === null || content.trim().length === 0) {
    log.debug(`No progress at ${path}, starting empty`);
    return ok(empty());
  }

  const json = parseJson(content);
  if (!json.success) {
    return fail(new MalformedDataError(`Error parsing ${path}: ${json.error}`));
  }

  const result = parse(json.value);
  if (!result.success) {
    return fail(new MalformedDataError(formatValidationError(result.error, `${subject} in ${path}`)));
  }
  return ok(result.data);
}

/**
 * Load the multi-player collection. A missing or empty file is an empty
 * collection.
 */
export function readProgressCollection(path: string): Promise<Result<ProgressCollection>> {
  return readProgressFile(path, safeParseProgressCollection, createEmptyCollection, "player progress");
}

/**
 * Load the single-player card map. A missing or empty file is an empty map.
 */
export function readLegacyProgress(path: string): Promise<Result<LegacyProgress>> {
  return readProgressFile(path, safeParseLegacyProgress, () => ({}), "single-player progress");
}

// =============================================================================
// Serialization
// =============================================================================

function sortedRecord<T, U>(record: Record<string, T>, map: (value: T) => U): Record<string, U> {
  return Object.fromEntries(Object.keys(record).sort().map((key) => [key, map(record[key])]));
}

export function serializeEntry(entry: ProgressEntry): ProgressEntry {
  return {
    box: entry.box,
    streak: entry.streak,
    passed: entry.passed,
    failed: entry.failed,
    last_reviewed: entry.last_reviewed,
  };
}

function serializeEvent(event: HistoryEvent): HistoryEvent {
  return {
    card_id: event.card_id,
    timestamp: event.timestamp,
    correct: event.correct,
  };
}

export function serializePlayer(player: PlayerRecord): PlayerRecord {
  return {
    id: player.id,
    name: player.name,
    total_answered: player.total_answered,
    cards: sortedRecord(player.cards, serializeEntry),
    history: player.history.map(serializeEvent),
  };
}

export function serializeCollection(collection: ProgressCollection): ProgressCollection {
  return sortedRecord(collection, serializePlayer);
}

// =============================================================================
// Writing
// =============================================================================

export async function writeProgressCollection(
  path: string,
  collection: ProgressCollection
): Promise<void> {
  await writeJsonFile(path, serializeCollection(collection));
  log.debug(`Saved progress for ${Object.keys(collection).length} players`);
}

export async function writeLegacyProgress(path: string, progress: LegacyProgress): Promise<void> {
  await writeJsonFile(path, sortedRecord(progress, serializeEntry));
  log.debug(`Saved single-player progress for ${Object.keys(progress).length} cards`);
}
