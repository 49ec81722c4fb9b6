/**
 * Command Handler Tests
 *
 * Review sessions and player management against a real config directory
 * with a fixed clock and fixed randomness.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parseGetCardOutput } from "@decouvertes/shared";
import {
  EMPTY_PLAYERS_MESSAGE,
  checkAnswerCommand,
  createPlayerCommand,
  deletePlayerCommand,
  formatCard,
  getCardCommand,
  getStatsCommand,
  listPlayersCommand,
  type CommandContext,
} from "../commands.js";
import { findProgressEntry, readProgressCollection } from "../leitner/progress-store.js";
import {
  createMockCard,
  createMockEntry,
  createMockPlayer,
  createTempDir,
  createTestContext,
  removeTempDir,
  writeCatalog,
} from "./test-helpers.js";

describe("commands", () => {
  let testDir: string;
  let ctx: CommandContext;

  beforeEach(async () => {
    testDir = await createTempDir("commands-test");
    ctx = createTestContext(testDir);
    await writeCatalog(ctx.paths, [createMockCard({ id: "c1", solution: "foo = []" })]);
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  async function readProgress(): Promise<unknown> {
    return JSON.parse(await readFile(ctx.paths.progressPath, "utf-8"));
  }

  async function readProgressRecord(): Promise<Record<string, unknown>> {
    return JSON.parse(await readFile(ctx.paths.progressPath, "utf-8"));
  }

  // ===========================================================================
  // Output Formatting
  // ===========================================================================

  describe("formatCard", () => {
    test("prints fields in catalog order", () => {
      const card = createMockCard({ id: "c7", tags: ["a", "b"] });
      expect(formatCard(card)).toBe(
        '{"id":"c7","language":"javascript","tags":["a","b"],' +
          '"prompt":"Declare an empty array named foo.","solution":"foo = []"}'
      );
    });
  });

  // ===========================================================================
  // Single-player sessions
  // ===========================================================================

  describe("single-player", () => {
    test("get-card prints the card and creates its entry", async () => {
      const result = await getCardCommand(ctx, {});

      expect(result).toEqual({ success: true, data: formatCard(createMockCard({ id: "c1" })) });
      expect(await readProgress()).toEqual({
        c1: { box: 1, streak: 0, passed: 0, failed: 0, last_reviewed: "2026-01-23T10:00:00.000Z" },
      });
    });

    test("check-answer accepts a normalized match and moves the card up", async () => {
      await getCardCommand(ctx, {});
      const result = await checkAnswerCommand(ctx, { cardId: "c1", answer: "foo=[]" });

      expect(result).toEqual({
        success: true,
        data: '{"correct":true,"new_box":2,"solution":"foo = []"}',
      });
      expect(await readProgress()).toEqual({
        c1: { box: 2, streak: 1, passed: 1, failed: 0, last_reviewed: "2026-01-23T10:00:00.000Z" },
      });
    });

    test("a wrong answer sends the card back to box 1", async () => {
      await writeFile(
        ctx.paths.progressPath,
        JSON.stringify({ c1: createMockEntry({ box: 5, streak: 4, passed: 4 }) })
      );

      const result = await checkAnswerCommand(ctx, { cardId: "c1", answer: "" });

      expect(result).toEqual({
        success: true,
        data: '{"correct":false,"new_box":1,"solution":"foo = []"}',
      });
    });

    test("get-card prints the done sentinel once every card is mastered", async () => {
      await writeFile(ctx.paths.progressPath, JSON.stringify({ c1: createMockEntry({ box: 6 }) }));

      const result = await getCardCommand(ctx, {});

      expect(result).toEqual({
        success: true,
        data: '{"id":"done","prompt":"Congratulations, you have mastered all cards!"}',
      });
      expect(result.success && parseGetCardOutput(JSON.parse(result.data))).toEqual({
        id: "done",
        prompt: "Congratulations, you have mastered all cards!",
      });
    });

    test("get-card does not rewrite progress when no entry was created", async () => {
      const original = JSON.stringify({ c1: createMockEntry({ box: 2 }) });
      await writeFile(ctx.paths.progressPath, original);

      await getCardCommand(ctx, {});

      expect(await readFile(ctx.paths.progressPath, "utf-8")).toBe(original);
    });

    test("the done prompt comes from settings", async () => {
      await writeCatalog(ctx.paths, []);
      const custom = createTestContext(testDir, {
        settings: { ...ctx.settings, completionMessage: "Nothing left!" },
      });

      expect(await getCardCommand(custom, {})).toEqual({
        success: true,
        data: '{"id":"done","prompt":"Nothing left!"}',
      });
    });
  });

  // ===========================================================================
  // Multi-player sessions
  // ===========================================================================

  describe("multi-player", () => {
    test("a full session updates only the player's record", async () => {
      expect(await createPlayerCommand(ctx, { name: "Ada" })).toEqual({
        success: true,
        data: "player-1",
      });

      const card = await getCardCommand(ctx, { playerId: "player-1" });
      expect(card.success && JSON.parse(card.data)).toMatchObject({ id: "c1" });

      const answer = await checkAnswerCommand(ctx, {
        playerId: "player-1",
        cardId: "c1",
        answer: "FOO = [];",
      });
      expect(answer).toEqual({
        success: true,
        data: '{"correct":true,"new_box":2,"solution":"foo = []"}',
      });

      expect(await readProgress()).toEqual({
        "player-1": {
          id: "player-1",
          name: "Ada",
          total_answered: 1,
          cards: {
            c1: { box: 2, streak: 1, passed: 1, failed: 0, last_reviewed: "2026-01-23T10:00:00.000Z" },
          },
          history: [{ card_id: "c1", timestamp: "2026-01-23T10:00:00.000Z", correct: true }],
        },
      });
    });

    test("get-card fails for an unknown player", async () => {
      const result = await getCardCommand(ctx, { playerId: "ghost" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("NOT_FOUND");
        expect(result.error.message).toBe("Player with ID 'ghost' not found.");
      }
    });

    test("check-answer fails for an unknown card without touching progress", async () => {
      await createPlayerCommand(ctx, { name: "Ada" });
      const before = await readFile(ctx.paths.progressPath, "utf-8");

      const result = await checkAnswerCommand(ctx, {
        playerId: "player-1",
        cardId: "nope",
        answer: "x",
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Card with ID 'nope' not found.");
      }
      expect(await readFile(ctx.paths.progressPath, "utf-8")).toBe(before);
    });
  });

  // ===========================================================================
  // Player commands
  // ===========================================================================

  describe("player management", () => {
    test("list-players prints a hint when there are none", async () => {
      expect(await listPlayersCommand(ctx)).toEqual({ success: true, data: EMPTY_PLAYERS_MESSAGE });
    });

    test("list-players prints players sorted by name", async () => {
      await createPlayerCommand(createTestContext(testDir, { generateId: () => "id-b" }), {
        name: "Bea",
      });
      await createPlayerCommand(createTestContext(testDir, { generateId: () => "id-a" }), {
        name: "Ada",
      });

      expect(await listPlayersCommand(ctx)).toEqual({
        success: true,
        data: "Name: Ada, ID: id-a\nName: Bea, ID: id-b",
      });
    });

    test("create-player rejects a blank name", async () => {
      const result = await createPlayerCommand(ctx, { name: " " });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("VALIDATION_ERROR");
      }
    });

    test("delete-player removes the player", async () => {
      await createPlayerCommand(ctx, { name: "Ada" });

      expect(await deletePlayerCommand(ctx, { playerId: "player-1" })).toEqual({
        success: true,
        data: "Player 'Ada' (player-1) deleted.",
      });
      expect(await readProgress()).toEqual({});
    });

    test("delete-player with an unknown id leaves the file unchanged", async () => {
      await createPlayerCommand(ctx, { name: "Ada" });
      const before = await readFile(ctx.paths.progressPath, "utf-8");

      const result = await deletePlayerCommand(ctx, { playerId: "ghost" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("NOT_FOUND");
      }
      expect(await readFile(ctx.paths.progressPath, "utf-8")).toBe(before);
    });

    test("get-stats reports counters and activity", async () => {
      await writeFile(
        ctx.paths.progressPath,
        JSON.stringify({
          "player-1": createMockPlayer({
            total_answered: 3,
            cards: { c1: createMockEntry({ box: 2, streak: 1, passed: 2, failed: 1 }) },
            history: [
              { card_id: "c1", timestamp: "2026-01-21T09:00:00.000Z", correct: true },
              { card_id: "c1", timestamp: "2026-01-22T09:00:00.000Z", correct: false },
              { card_id: "c1", timestamp: "2026-01-23T08:00:00.000Z", correct: true },
            ],
          }),
        })
      );

      expect(await getStatsCommand(ctx, { playerId: "player-1" })).toEqual({
        success: true,
        data: [
          "Stats for Player: Ada",
          "------------------------------",
          "Total Cards Answered: 3",
          "Correct Answers: 2",
          "Incorrect Answers: 1",
          "Cards Answered Today: 1",
          "Longest Daily Streak: 3 day(s)",
        ].join("\n"),
      });
    });
  });

  // ===========================================================================
  // Card ids that name Object.prototype members
  // ===========================================================================

  describe("card ids that name Object.prototype members", () => {
    beforeEach(async () => {
      await writeCatalog(ctx.paths, [
        createMockCard({ id: "constructor", solution: "x" }),
        createMockCard({ id: "__proto__", solution: "y" }),
      ]);
    });

    test("single-player progress stays valid across get-card and check-answer", async () => {
      await getCardCommand(ctx, {});
      expect(Object.keys(await readProgressRecord())).toEqual(["__proto__", "constructor"]);

      expect(await checkAnswerCommand(ctx, { cardId: "constructor", answer: "x" })).toEqual({
        success: true,
        data: '{"correct":true,"new_box":2,"solution":"x"}',
      });
      expect(await checkAnswerCommand(ctx, { cardId: "__proto__", answer: "y" })).toEqual({
        success: true,
        data: '{"correct":true,"new_box":2,"solution":"y"}',
      });

      const progress = await readProgressRecord();
      expect(Object.getOwnPropertyDescriptor(progress, "constructor")?.value).toMatchObject({ box: 2 });
      expect(Object.getOwnPropertyDescriptor(progress, "__proto__")?.value).toMatchObject({ box: 2 });

      const next = await getCardCommand(ctx, {});
      expect(next.success).toBe(true);
    });

    test("multi-player progress keeps the entries under the player", async () => {
      await createPlayerCommand(ctx, { name: "Ada" });
      await getCardCommand(ctx, { playerId: "player-1" });

      const result = await checkAnswerCommand(ctx, {
        playerId: "player-1",
        cardId: "__proto__",
        answer: "y",
      });
      expect(result).toEqual({
        success: true,
        data: '{"correct":true,"new_box":2,"solution":"y"}',
      });

      const collection = await readProgressCollection(ctx.paths.progressPath);
      expect(collection.success).toBe(true);
      if (collection.success) {
        const { cards } = collection.data["player-1"];
        expect(Object.keys(cards)).toEqual(["__proto__", "constructor"]);
        expect(findProgressEntry(cards, "__proto__")?.box).toBe(2);
        expect(findProgressEntry(cards, "constructor")?.box).toBe(1);
      }
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe("failures", () => {
    test("a missing config directory is a configuration error", async () => {
      const missing = createTestContext(join(testDir, "missing"));
      const result = await getCardCommand(missing, {});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("CONFIGURATION_ERROR");
      }
    });

    test("malformed progress is reported, not reset", async () => {
      await writeFile(ctx.paths.progressPath, "{ broken");

      const result = await getCardCommand(ctx, {});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("MALFORMED_DATA");
      }
      expect(await readFile(ctx.paths.progressPath, "utf-8")).toBe("{ broken");
    });
  });
});
