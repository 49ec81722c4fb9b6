/**
 * Command Dispatcher
 *
 * Parses `decouvertes <command> [--flag=value ...]`, runs the matching
 * command handler and maps its Result to stdout/stderr and an exit status.
 * This is the only place that decides how a failure ends the process.
 */

import { parseArgs } from "node:util";
import { getDataPaths, loadSettings, resolveConfigDir } from "./config.js";
import {
  checkAnswerCommand,
  createPlayerCommand,
  deletePlayerCommand,
  getCardCommand,
  getStatsCommand,
  listPlayersCommand,
  type CommandContext,
} from "./commands.js";
import { LeitnerError, ValidationError, exitCodeFor, fail, ok, type Result } from "./errors.js";
import { cliLog as log } from "./logger.js";
import { generatePlayerId } from "./leitner/index.js";

// =============================================================================
// Types
// =============================================================================

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  /** Overrides for the clock, randomness and id generation */
  context?: Partial<Pick<CommandContext, "now" | "random" | "generateId">>;
}

type FlagValues = Record<string, string | undefined>;

interface CommandDefinition {
  usage: string;
  description: string;
  flags: readonly string[];
  run: (ctx: CommandContext, flags: FlagValues) => Promise<Result<string>>;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

// =============================================================================
// Flag Parsing
// =============================================================================

/**
 * Parse `--name=value` / `--name value` flags. Every flag takes a string;
 * unknown flags and positionals are rejected.
 */
export function parseFlags(args: string[], allowed: readonly string[]): Result<FlagValues> {
  const options: Record<string, { type: "string" }> = {};
  for (const name of allowed) {
    options[name] = { type: "string" };
  }

  try {
    const { values } = parseArgs({ args, options, strict: true, allowPositionals: false });
    const flags: FlagValues = {};
    for (const [key, value] of Object.entries(values)) {
      if (typeof value === "string") {
        flags[key] = value;
      }
    }
    return ok(flags);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return fail(new ValidationError(message));
  }
}

function requireFlag(flags: FlagValues, name: string, command: string): Result<string> {
  const value = flags[name];
  if (value === undefined) {
    return fail(new ValidationError(`--${name} flag is required for ${command}`));
  }
  return ok(value);
}

// =============================================================================
// Command Table
// =============================================================================

const COMMANDS: Record<string, CommandDefinition> = {
  "get-card": {
    usage: "get-card [--player-id=ID]",
    description: "Print the next card to review as JSON",
    flags: ["player-id"],
    run: (ctx, flags) => getCardCommand(ctx, { playerId: flags["player-id"] }),
  },
  "check-answer": {
    usage: "check-answer --id=ID --answer=TEXT [--player-id=ID]",
    description: "Check an answer and move the card between boxes",
    flags: ["id", "answer", "player-id"],
    run: async (ctx, flags) => {
      const cardId = requireFlag(flags, "id", "check-answer");
      if (!cardId.success) {
        return cardId;
      }
      const answer = requireFlag(flags, "answer", "check-answer");
      if (!answer.success) {
        return answer;
      }
      return checkAnswerCommand(ctx, {
        playerId: flags["player-id"],
        cardId: cardId.data,
        answer: answer.data,
      });
    },
  },
  "create-player": {
    usage: "create-player --name=NAME",
    description: "Create a player and print its id",
    flags: ["name"],
    run: async (ctx, flags) => {
      const name = requireFlag(flags, "name", "create-player");
      if (!name.success) {
        return name;
      }
      return createPlayerCommand(ctx, { name: name.data });
    },
  },
  "list-players": {
    usage: "list-players",
    description: "List every player as 'Name: X, ID: Y'",
    flags: [],
    run: (ctx) => listPlayersCommand(ctx),
  },
  "delete-player": {
    usage: "delete-player --player-id=ID",
    description: "Delete a player and all of their progress",
    flags: ["player-id"],
    run: async (ctx, flags) => {
      const playerId = requireFlag(flags, "player-id", "delete-player");
      if (!playerId.success) {
        return playerId;
      }
      return deletePlayerCommand(ctx, { playerId: playerId.data });
    },
  },
  "get-stats": {
    usage: "get-stats --player-id=ID",
    description: "Print a player's statistics",
    flags: ["player-id"],
    run: async (ctx, flags) => {
      const playerId = requireFlag(flags, "player-id", "get-stats");
      if (!playerId.success) {
        return playerId;
      }
      return getStatsCommand(ctx, { playerId: playerId.data });
    },
  },
};

export const COMMAND_NAMES = Object.keys(COMMANDS);

export function formatUsage(): string {
  const width = Math.max(...Object.values(COMMANDS).map((command) => command.usage.length));
  const lines = Object.values(COMMANDS).map(
    (command) => `  ${command.usage.padEnd(width)}  ${command.description}`
  );
  return ["Usage: decouvertes <command> [flags]", "", "Commands:", ...lines].join("\n");
}

// =============================================================================
// Entry Point
// =============================================================================

async function createContext(options: CliOptions): Promise<CommandContext> {
  const paths = getDataPaths(resolveConfigDir(options.env ?? process.env));
  const settings = await loadSettings(paths);
  return {
    paths,
    settings,
    now: () => new Date(),
    random: Math.random,
    generateId: generatePlayerId,
    ...options.context,
  };
}

function reportError(io: CliIO, error: LeitnerError): number {
  io.stderr(`Error: ${error.message}`);
  return exitCodeFor(error.code);
}

/**
 * Run one command and return the exit status.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIO;
  const [commandName, ...args] = argv;

  if (commandName === "help" || commandName === "--help" || commandName === "-h") {
    io.stdout(formatUsage());
    return 0;
  }

  if (commandName === undefined) {
    io.stderr(formatUsage());
    return reportError(io, new ValidationError(`Expected a command: ${COMMAND_NAMES.join(", ")}`));
  }

  const command = Object.hasOwn(COMMANDS, commandName) ? COMMANDS[commandName] : undefined;
  if (!command) {
    return reportError(
      io,
      new ValidationError(
        `Unknown command: ${commandName}. Expected one of: ${COMMAND_NAMES.join(", ")}`
      )
    );
  }

  const flags = parseFlags(args, command.flags);
  if (!flags.success) {
    return reportError(io, flags.error);
  }

  try {
    const ctx = await createContext(options);
    const result = await command.run(ctx, flags.data);
    if (!result.success) {
      log.debug(`${commandName} failed with ${result.error.code}`);
      return reportError(io, result.error);
    }
    io.stdout(result.data);
    return 0;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error(`Unexpected error in ${commandName}: ${message}`, {
      stack: e instanceof Error ? e.stack : undefined,
    });
    return reportError(io, new LeitnerError(`An unexpected error occurred: ${message}`, "INTERNAL_ERROR"));
  }
}
