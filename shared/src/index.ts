/**
 * Découvertes Shared Types and Protocol
 *
 * This package contains:
 * - Zod schemas for cards.json, progress.json and command output
 * - TypeScript types for cards, progress entries and players
 * - Error codes shared by the engine and the command surface
 */

// Core types
export type { PlayerSummary, ErrorCode } from "./types.js";
export { DONE_CARD_ID } from "./types.js";

// Protocol schemas
export {
  // Catalog
  CardSchema,
  CatalogSchema,
  // Progress
  ProgressEntrySchema,
  HistoryEventSchema,
  PlayerRecordSchema,
  ProgressCollectionSchema,
  LegacyProgressSchema,
  // Command output
  CheckResultSchema,
  DoneSentinelSchema,
  GetCardOutputSchema,
  // Validation utilities
  parseCatalog,
  safeParseCatalog,
  safeParseProgressCollection,
  safeParseLegacyProgress,
  parseGetCardOutput,
  formatValidationError,
} from "./protocol.js";

// Protocol types
export type {
  Card,
  ProgressEntry,
  HistoryEvent,
  PlayerRecord,
  ProgressCollection,
  LegacyProgress,
  CheckResult,
  DoneSentinel,
  GetCardOutput,
} from "./protocol.js";
