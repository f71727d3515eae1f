#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { loadConfig, withOverrides } from './config.js';
import { buildLedger, formatLedger } from './history/ledger.js';
import { loadReplay, resolveReplayPath } from './history/loadReplay.js';
import { logger } from './logger.js';
import { parseArgs } from './cliArgs.js';
import { createSession } from './session.js';
import { dryRunSeed, isDryRun } from './utils.js';

function printReplay(arg: string) {
  const file = resolveReplayPath(arg);
  const replay = loadReplay(file);
  if (!replay.result) {
    console.log(`Game ${replay.gameId} did not finish (${replay.events.length} events recorded).`);
    return;
  }
  console.log(formatLedger(buildLedger(replay.result, replay.events)));
}

async function main() {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));

  if (args.replay) {
    printReplay(args.replay);
    return;
  }

  const dryRun = args.dryRun || isDryRun();
  if (!dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  if (args.ui) {
    // The TUI renders log entries itself.
    logger.setConsoleOutputEnabled(false);
  }

  const fileConfig = loadConfig(path.resolve(process.cwd(), args.configFile));
  const config = args.seed !== undefined ? withOverrides(fileConfig, { seed: args.seed }) : fileConfig;

  const { engine, history } = createSession(config, {
    dryRun,
    dryRunSeed: args.seed ?? (isDryRun() ? dryRunSeed() : undefined),
    // Dry runs leave no files behind.
    persist: !dryRun,
  });
  logger.follow(engine.events);
  if (dryRun) {
    logger.log({ type: 'SYSTEM', content: `Dry-run mode enabled (seed: ${args.seed ?? dryRunSeed()})` });
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

  const ui = args.ui
    ? (await import('./ui/runUi.js')).runUi({
        players: engine.players.map(p => ({ id: p.id, model: p.model })),
        events: engine.events,
      })
    : null;

  const gamePromise = engine.run(controller.signal);

  if (!ui) {
    await gamePromise;
    if (!dryRun) logger.log({ type: 'SYSTEM', content: `Saved ${history.logFile}` });
    return;
  }

  const uiPromise = ui.waitUntilExit().then(() => {
    // Leaving the TUI early switches back to console output.
    logger.setConsoleOutputEnabled(true);
  });

  try {
    await Promise.all([gamePromise, uiPromise]);
  } finally {
    ui.unmount();
  }
}

main().catch(error => {
  logger.setConsoleOutputEnabled(true);
  console.error('Fatal Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
