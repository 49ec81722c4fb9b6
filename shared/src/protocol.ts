/**
 * Découvertes Data Protocol
 *
 * Zod schemas for the files the engine reads and writes (cards.json,
 * progress.json) and for the JSON it prints for the editor plugin.
 * Field names and order follow the on-disk format the editor plugin reads.
 */

import { z } from "zod";
import { DONE_CARD_ID } from "./types.js";

// =============================================================================
// Card Catalog Schemas
// =============================================================================

/**
 * Schema for a single flashcard in cards.json.
 */
export const CardSchema = z.object({
  id: z.string().min(1, "Card ID is required"),
  language: z.string(),
  /** Older catalogs sometimes omit tags entirely */
  tags: z.array(z.string()).default([]),
  prompt: z.string(),
  solution: z.string(),
});

/**
 * Schema for the whole catalog. Card ids must be unique.
 */
export const CatalogSchema = z.array(CardSchema).superRefine((cards, ctx) => {
  const seen = new Set<string>();
  cards.forEach((card, index) => {
    if (seen.has(card.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "id"],
        message: `Duplicate card id "${card.id}"`,
      });
    }
    seen.add(card.id);
  });
});

// =============================================================================
// Progress Schemas
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map keyed by player or card id. Unlike z.record, every own key of the
 * input survives as an own key of the output, "__proto__" included.
 */
function idRecord<T extends z.ZodTypeAny>(schema: T) {
  return z
    .custom<Record<string, unknown>>(isPlainObject, "Expected object")
    .transform((record, ctx) => {
      const entries: [string, z.output<T>][] = [];
      for (const key of Object.keys(record)) {
        const result = schema.safeParse(record[key]);
        if (result.success) {
          entries.push([key, result.data]);
        } else {
          for (const issue of result.error.issues) {
            ctx.addIssue({ ...issue, path: [key, ...issue.path] });
          }
        }
      }
      return Object.fromEntries(entries);
    });
}

/**
 * RFC 3339 timestamp. Single-player files carry local times with an offset.
 */
const TimestampSchema = z.string().datetime({ offset: true });

/**
 * Schema for one card's review state for one player.
 *
 * box has no upper bound: a box past the last review box means the card is
 * mastered and no longer drawn.
 */
export const ProgressEntrySchema = z.object({
  box: z.number().int().min(1),
  streak: z.number().int().min(0),
  passed: z.number().int().min(0).default(0),
  failed: z.number().int().min(0).default(0),
  last_reviewed: TimestampSchema,
});

/**
 * Schema for one answered card in a player's history log.
 */
export const HistoryEventSchema = z.object({
  card_id: z.string().min(1),
  timestamp: TimestampSchema,
  correct: z.boolean(),
});

/**
 * Schema for a player and all of their progress.
 */
export const PlayerRecordSchema = z.object({
  id: z.string().min(1, "Player ID is required"),
  name: z.string(),
  total_answered: z.number().int().min(0).default(0),
  cards: idRecord(ProgressEntrySchema).default({}),
  history: z.array(HistoryEventSchema).default([]),
});

/**
 * Schema for the multi-player progress file: player id -> PlayerRecord.
 */
export const ProgressCollectionSchema = idRecord(PlayerRecordSchema);

/**
 * Schema for the single-player progress file: card id -> ProgressEntry.
 */
export const LegacyProgressSchema = idRecord(ProgressEntrySchema);

// =============================================================================
// Command Output Schemas
// =============================================================================

/**
 * Schema for the check-answer result.
 */
export const CheckResultSchema = z.object({
  correct: z.boolean(),
  new_box: z.number().int(),
  solution: z.string(),
});

/**
 * Schema for the get-card sentinel printed once nothing is left to review.
 */
export const DoneSentinelSchema = z.object({
  id: z.literal(DONE_CARD_ID),
  prompt: z.string(),
});

/**
 * Schema for anything get-card prints. The sentinel is checked first since
 * a card schema would also accept it if it carried the other fields.
 */
export const GetCardOutputSchema = z.union([DoneSentinelSchema.strict(), CardSchema]);

// =============================================================================
// Inferred TypeScript Types
// =============================================================================

export type Card = z.infer<typeof CardSchema>;
export type ProgressEntry = z.infer<typeof ProgressEntrySchema>;
export type HistoryEvent = z.infer<typeof HistoryEventSchema>;
export type PlayerRecord = z.infer<typeof PlayerRecordSchema>;
export type ProgressCollection = z.infer<typeof ProgressCollectionSchema>;
export type LegacyProgress = z.infer<typeof LegacyProgressSchema>;
export type CheckResult = z.infer<typeof CheckResultSchema>;
export type DoneSentinel = z.infer<typeof DoneSentinelSchema>;
export type GetCardOutput = z.infer<typeof GetCardOutputSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Parse and validate a catalog.
 * @throws ZodError if validation fails
 */
export function parseCatalog(data: unknown): Card[] {
  return CatalogSchema.parse(data);
}

export function safeParseCatalog(data: unknown) {
  return CatalogSchema.safeParse(data);
}

export function safeParseProgressCollection(data: unknown) {
  return ProgressCollectionSchema.safeParse(data);
}

export function safeParseLegacyProgress(data: unknown) {
  return LegacyProgressSchema.safeParse(data);
}

/**
 * Parse whatever get-card printed.
 * @throws ZodError if validation fails
 */
export function parseGetCardOutput(data: unknown): GetCardOutput {
  return GetCardOutputSchema.parse(data);
}

/**
 * Format a Zod validation error into a human-readable message.
 */
export function formatValidationError(error: z.ZodError, subject: string): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  - ${path}: ${issue.message}`;
  });
  return `Invalid ${subject}:\n` + issues.join("\n");
}
