/**
 * Découvertes CLI
 *
 * Entry point for the command-line engine behind the editor plugin:
 * - get-card / check-answer for review sessions
 * - create-player / list-players / delete-player for player management
 * - get-stats for a player's summary
 */

import { runCli } from "./cli.js";

process.exitCode = await runCli(process.argv.slice(2));
