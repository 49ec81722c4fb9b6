/**
 * Card Catalog
 *
 * Loads the immutable set of flashcards from cards.json. The catalog is read
 * once per command and never written.
 */

import { type Card, formatValidationError, safeParseCatalog } from "@decouvertes/shared";
import { ConfigurationError, MalformedDataError, NotFoundError, fail, ok, type Result } from "../errors.js";
import { createLogger } from "../logger.js";
import { parseJson, readTextFile } from "./data-files.js";

const log = createLogger("catalog");

/**
 * Read and validate the catalog file.
 *
 * - missing file: ConfigurationError
 * - empty file, invalid JSON or schema mismatch: MalformedDataError
 */
export async function loadCatalog(cardsPath: string): Promise<Result<Card[]>> {
  const content = await readTextFile(cardsPath);
  if (content === null) {
    return fail(
      new ConfigurationError(
        `Card catalog not found at ${cardsPath}. Please create it with your flashcards.`
      )
    );
  }

  if (content.trim().length === 0) {
    return fail(new MalformedDataError(`Card catalog at ${cardsPath} is empty.`));
  }

  const json = parseJson(content);
  if (!json.success) {
    return fail(new MalformedDataError(`Error parsing ${cardsPath}: ${json.error}`));
  }

  const result = safeParseCatalog(json.value);
  if (!result.success) {
    return fail(new MalformedDataError(formatValidationError(result.error, `card catalog in ${cardsPath}`)));
  }

  log.debug(`Loaded ${result.data.length} cards from ${cardsPath}`);
  return ok(result.data);
}

/**
 * Look up a card by id.
 */
export function findCard(catalog: readonly Card[], cardId: string): Result<Card> {
  const card = catalog.find((candidate) => candidate.id === cardId);
  if (!card) {
    return fail(new NotFoundError(`Card with ID '${cardId}' not found.`));
  }
  return ok(card);
}
