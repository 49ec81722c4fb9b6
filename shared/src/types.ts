/**
 * Découvertes Shared Types
 *
 * Core type definitions shared by the engine and the command surface.
 * The editor plugin consumes these shapes as JSON or text.
 */

/**
 * A player as reported by `list-players`.
 *
 * @property id - Opaque 32-character hex token
 * @property name - Display name chosen at creation
 */
export interface PlayerSummary {
  id: string;
  name: string;
}

/**
 * Error codes surfaced by the command-line tool.
 *
 * The editor plugin only sees the message on stderr and the exit status,
 * but the codes keep error handling inside the engine structured.
 */
export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "NOT_FOUND"
  | "MALFORMED_DATA"
  | "VALIDATION_ERROR"
  | "INTERNAL_ERROR";

/** Card id emitted by `get-card` when no card is eligible for review. */
export const DONE_CARD_ID = "done";
