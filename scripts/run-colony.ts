#!/usr/bin/env npx tsx
/**
 * Play a game of ants against bees in the terminal.
 *
 * Usage:
 *   npx tsx scripts/run-colony.ts                  # Dry layout, test plan, 2 food
 *   npx tsx scripts/run-colony.ts -t -w            # 10 food, tunnels with water
 *   npx tsx scripts/run-colony.ts -f --seed 7      # Full plan, reproducible
 *   npx tsx scripts/run-colony.ts -t --plan plans/ten-food-defence.json  # Scripted deployments
 *
 * Without --plan the colony reads commands each turn; type help for a list.
 */

import { USAGE, createColony, loadDeploymentPlan, makeGameId, parseGameArgs } from '../src/game/setup';
import { attachColonyLogger, createEngineLogger, getColonyLogger } from '../src/server/colony-logger';
import { createConsoleIO, createInteractiveStrategy, createScriptedStrategy } from '../src/strategy';
import { ColonyError, consoleEngineLogger, type Strategy } from '../src/engine';

async function main(): Promise<void> {
  const options = parseGameArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const gameId = makeGameId(options);
  const logger = getColonyLogger(gameId, options.logDir ?? undefined);
  let io: ReturnType<typeof createConsoleIO> | null = null;
  let strategy: Strategy;
  if (options.deploymentsFile) {
    strategy = createScriptedStrategy(loadDeploymentPlan(options.deploymentsFile));
  } else {
    io = createConsoleIO();
    strategy = createInteractiveStrategy(io);
  }

  const colony = createColony(options, strategy, createEngineLogger(logger, consoleEngineLogger));
  logger.gameStarted(options.layout, options.plan, options.food);
  attachColonyLogger(colony, logger);

  console.log('Ants vs. SomeBees');
  console.log('=================\n');
  console.log(`Layout: ${options.layout}  Plan: ${options.plan}  Food: ${options.food}`);
  if (options.seed !== null) {
    console.log(`Seed: ${options.seed}`);
  }
  console.log(`Places: ${[...colony.places.keys()].filter(name => name !== 'Hive').join(', ')}\n`);

  try {
    const result = await colony.simulate();
    console.log(`\n${colony}`);
    console.log(`Result: ${result.status} at time ${result.time}`);
    console.log(`Log: ${logger.getLogPath()}`);
  } finally {
    io?.close();
  }
}

main().catch((error) => {
  if (error instanceof ColonyError) {
    console.error(`Error: ${error.message}`);
    console.error(`\n${USAGE}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
