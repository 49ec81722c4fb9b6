/**
 * Command Handlers
 *
 * One function per CLI command. Each runs a single load -> operate -> save
 * cycle against the config directory and returns the text to print on
 * stdout, or the error that stops the command. Nothing here writes to the
 * console or exits the process.
 */

import { DONE_CARD_ID, type Card, type ProgressCollection } from "@decouvertes/shared";
import { ensureConfigDir, type DataPaths, type LeitnerSettings } from "./config.js";
import { ok, type Result } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  applyAnswer,
  computePlayerStats,
  createBoxSchedule,
  createPlayer,
  createProgressEntry,
  deletePlayer,
  ensureProgressEntries,
  findCard,
  findProgressEntry,
  formatStatsReport,
  getPlayer,
  isCorrectAnswer,
  listPlayers,
  loadCatalog,
  putPlayer,
  readLegacyProgress,
  readProgressCollection,
  recordAnswer,
  selectNextCard,
  toCheckResult,
  writeLegacyProgress,
  writeProgressCollection,
  type CardProgress,
  type RandomSource,
  type Selection,
} from "./leitner/index.js";

const log = createLogger("commands");

/**
 * Everything a command needs from the outside world. Time, randomness and
 * id generation are injected so commands are deterministic under test.
 */
export interface CommandContext {
  paths: DataPaths;
  settings: LeitnerSettings;
  now: () => Date;
  random: RandomSource;
  generateId: () => string;
}

export const EMPTY_PLAYERS_MESSAGE =
  "No players found. Create one with: decouvertes create-player --name=NAME";

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Card JSON in the catalog's field order.
 */
export function formatCard(card: Card): string {
  return JSON.stringify({
    id: card.id,
    language: card.language,
    tags: card.tags,
    prompt: card.prompt,
    solution: card.solution,
  });
}

export function formatSelection(selection: Selection, completionMessage: string): string {
  if (selection.kind === "done") {
    return JSON.stringify({ id: DONE_CARD_ID, prompt: completionMessage });
  }
  return formatCard(selection.card);
}

// =============================================================================
// Shared Steps
// =============================================================================

async function loadCatalogFor(ctx: CommandContext): Promise<Result<Card[]>> {
  const dir = await ensureConfigDir(ctx.paths);
  if (!dir.success) {
    return dir;
  }
  return loadCatalog(ctx.paths.cardsPath);
}

/**
 * Make sure every card has an entry, then draw. Newly created entries are
 * handed to `persist` before the draw.
 */
async function selectWithLazyEntries(
  ctx: CommandContext,
  catalog: Card[],
  cards: CardProgress,
  persist: (cards: CardProgress) => Promise<void>
): Promise<Selection> {
  const ensured = ensureProgressEntries(catalog, cards, ctx.now());
  if (ensured.created.length > 0) {
    await persist(ensured.cards);
  }
  const schedule = createBoxSchedule(ctx.settings.boxWeights);
  return selectNextCard(catalog, ensured.cards, schedule, ctx.random);
}

// =============================================================================
// get-card
// =============================================================================

export interface GetCardInput {
  /** Omitted: single-player progress file */
  playerId?: string;
}

export async function getCardCommand(ctx: CommandContext, input: GetCardInput): Promise<Result<string>> {
  const catalog = await loadCatalogFor(ctx);
  if (!catalog.success) {
    return catalog;
  }

  const { progressPath } = ctx.paths;
  let selection: Selection;

  if (input.playerId === undefined) {
    const progress = await readLegacyProgress(progressPath);
    if (!progress.success) {
      return progress;
    }
    selection = await selectWithLazyEntries(ctx, catalog.data, progress.data, (cards) =>
      writeLegacyProgress(progressPath, cards)
    );
  } else {
    const playerId = input.playerId;
    const collection = await readProgressCollection(progressPath);
    if (!collection.success) {
      return collection;
    }
    const player = getPlayer(collection.data, playerId);
    if (!player.success) {
      return player;
    }
    const players = collection.data;
    const record = player.data;
    selection = await selectWithLazyEntries(ctx, catalog.data, record.cards, (cards) =>
      writeProgressCollection(progressPath, putPlayer(players, playerId, { ...record, cards }))
    );
  }

  return ok(formatSelection(selection, ctx.settings.completionMessage));
}

// =============================================================================
// check-answer
// =============================================================================

export interface CheckAnswerInput {
  playerId?: string;
  cardId: string;
  answer: string;
}

export async function checkAnswerCommand(
  ctx: CommandContext,
  input: CheckAnswerInput
): Promise<Result<string>> {
  const catalog = await loadCatalogFor(ctx);
  if (!catalog.success) {
    return catalog;
  }
  const card = findCard(catalog.data, input.cardId);
  if (!card.success) {
    return card;
  }

  const { progressPath } = ctx.paths;
  const now = ctx.now();
  const correct = isCorrectAnswer(input.answer, card.data.solution);

  if (input.playerId === undefined) {
    const progress = await readLegacyProgress(progressPath);
    if (!progress.success) {
      return progress;
    }
    const current = findProgressEntry(progress.data, input.cardId) ?? createProgressEntry(now);
    const updated = applyAnswer(current, correct, now);
    await writeLegacyProgress(progressPath, { ...progress.data, [input.cardId]: updated });
    log.info(`Answered ${input.cardId}: ${correct ? "correct" : "incorrect"} -> box ${updated.box}`);
    return ok(JSON.stringify(toCheckResult(correct, updated, card.data.solution)));
  }

  const playerId = input.playerId;
  const collection = await readProgressCollection(progressPath);
  if (!collection.success) {
    return collection;
  }
  const player = getPlayer(collection.data, playerId);
  if (!player.success) {
    return player;
  }

  const answered = recordAnswer(player.data, input.cardId, correct, now);
  await writeProgressCollection(progressPath, putPlayer(collection.data, playerId, answered.player));

  return ok(JSON.stringify(toCheckResult(correct, answered.entry, card.data.solution)));
}

// =============================================================================
// Player commands
// =============================================================================

async function loadCollection(ctx: CommandContext): Promise<Result<ProgressCollection>> {
  const dir = await ensureConfigDir(ctx.paths);
  if (!dir.success) {
    return dir;
  }
  return readProgressCollection(ctx.paths.progressPath);
}

export async function createPlayerCommand(
  ctx: CommandContext,
  input: { name: string }
): Promise<Result<string>> {
  const collection = await loadCollection(ctx);
  if (!collection.success) {
    return collection;
  }

  const created = createPlayer(collection.data, input.name, ctx.generateId());
  if (!created.success) {
    return created;
  }

  await writeProgressCollection(ctx.paths.progressPath, created.data.collection);
  return ok(created.data.player.id);
}

export async function listPlayersCommand(ctx: CommandContext): Promise<Result<string>> {
  const collection = await loadCollection(ctx);
  if (!collection.success) {
    return collection;
  }

  const players = listPlayers(collection.data);
  if (players.length === 0) {
    return ok(EMPTY_PLAYERS_MESSAGE);
  }
  return ok(players.map((player) => `Name: ${player.name}, ID: ${player.id}`).join("\n"));
}

export async function deletePlayerCommand(
  ctx: CommandContext,
  input: { playerId: string }
): Promise<Result<string>> {
  const collection = await loadCollection(ctx);
  if (!collection.success) {
    return collection;
  }

  const deleted = deletePlayer(collection.data, input.playerId);
  if (!deleted.success) {
    return deleted;
  }

  await writeProgressCollection(ctx.paths.progressPath, deleted.data.collection);
  return ok(`Player '${deleted.data.removed.name}' (${input.playerId}) deleted.`);
}

export async function getStatsCommand(
  ctx: CommandContext,
  input: { playerId: string }
): Promise<Result<string>> {
  const collection = await loadCollection(ctx);
  if (!collection.success) {
    return collection;
  }

  const player = getPlayer(collection.data, input.playerId);
  if (!player.success) {
    return player;
  }

  const stats = computePlayerStats(player.data, ctx.now(), ctx.settings.timeZone);
  return ok(formatStatsReport(stats));
}
