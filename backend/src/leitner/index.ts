/**
 * Leitner Engine
 *
 * Re-exports from the leitner submodules for convenient access.
 */

// Box schedule
export {
  INITIAL_BOX,
  DEFAULT_BOX_COUNT,
  DEFAULT_BOX_SCHEDULE,
  geometricBoxWeights,
  createBoxSchedule,
  isInReviewPool,
  isMastered,
  type BoxSchedule,
  type BoxWeightFn,
} from "./box-weights.js";

// Weighted sampling
export { sampleWeighted, sampleUniform, type RandomSource } from "./weighted-sampler.js";

// Catalog
export { loadCatalog, findCard } from "./catalog.js";

// Progress store
export {
  createProgressEntry,
  findProgressEntry,
  readProgressCollection,
  writeProgressCollection,
  readLegacyProgress,
  writeLegacyProgress,
} from "./progress-store.js";

// Selector
export {
  ensureProgressEntries,
  selectNextCard,
  type CardProgress,
  type Selection,
} from "./selector.js";

// Answer checker
export {
  normalizeAnswer,
  isCorrectAnswer,
  applyAnswer,
  recordAnswer,
  toCheckResult,
  type RecordedAnswer,
} from "./answer-checker.js";

// Stats
export { computePlayerStats, formatStatsReport, type PlayerStats } from "./stats.js";

// Player registry
export {
  generatePlayerId,
  createPlayer,
  listPlayers,
  getPlayer,
  putPlayer,
  deletePlayer,
} from "./player-registry.js";
