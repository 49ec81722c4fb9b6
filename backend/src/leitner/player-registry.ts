/**
 * Player Registry
 *
 * Creates, lists, looks up and deletes players in a progress collection.
 * Every function returns a new collection and leaves its input untouched.
 */

import { randomBytes } from "node:crypto";
import type { PlayerRecord, PlayerSummary, ProgressCollection } from "@decouvertes/shared";
import { NotFoundError, ValidationError, fail, ok, type Result } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("player-registry");

/** Random bytes behind a player id (hex-encoded to 32 characters) */
const PLAYER_ID_BYTES = 16;

/**
 * New opaque player id. Collisions are not checked for.
 */
export function generatePlayerId(): string {
  return randomBytes(PLAYER_ID_BYTES).toString("hex");
}

export function createPlayerRecord(id: string, name: string): PlayerRecord {
  return {
    id,
    name,
    total_answered: 0,
    cards: {},
    history: [],
  };
}

export interface CreatedPlayer {
  collection: ProgressCollection;
  player: PlayerRecord;
}

/**
 * Add a player. The name is trimmed and must not be empty.
 */
export function createPlayer(
  collection: ProgressCollection,
  name: string,
  id: string = generatePlayerId()
): Result<CreatedPlayer> {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    return fail(new ValidationError("Player name must not be empty."));
  }

  const player = createPlayerRecord(id, trimmed);
  log.info(`Created player '${trimmed}' (${id})`);
  return ok({ collection: { ...collection, [id]: player }, player });
}

/**
 * All players, sorted by name and then id.
 */
export function listPlayers(collection: ProgressCollection): PlayerSummary[] {
  return Object.entries(collection)
    .map(([id, player]) => ({ id, name: player.name }))
    .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id));
}

export function getPlayer(collection: ProgressCollection, playerId: string): Result<PlayerRecord> {
  const player = Object.hasOwn(collection, playerId) ? collection[playerId] : undefined;
  if (!player) {
    return fail(new NotFoundError(`Player with ID '${playerId}' not found.`));
  }
  return ok(player);
}

/**
 * Replace the record stored under a player id.
 */
export function putPlayer(
  collection: ProgressCollection,
  playerId: string,
  player: PlayerRecord
): ProgressCollection {
  return { ...collection, [playerId]: player };
}

export interface DeletedPlayer {
  collection: ProgressCollection;
  removed: PlayerRecord;
}

export function deletePlayer(
  collection: ProgressCollection,
  playerId: string
): Result<DeletedPlayer> {
  const found = getPlayer(collection, playerId);
  if (!found.success) {
    return found;
  }

  const { [playerId]: removed, ...rest } = collection;
  log.info(`Deleted player '${removed.name}' (${playerId})`);
  return ok({ collection: rest, removed });
}
