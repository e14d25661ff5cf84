/**
 * Spectator Server Entry Point.
 *
 * Plays one colony game and streams it to WebSocket spectators. When the
 * game ends the server closes every connection and the process exits.
 *
 * Usage:
 *   npx tsx src/server/index.ts
 *
 * Environment variables:
 *   PORT               - Server port (default: 3002)
 *   TURN_DELAY_MS      - Pause between turns (default: 1000)
 *   COLONY_LAYOUT      - test, multi, dry or wet (default: wet)
 *   COLONY_PLAN        - Assault plan: test, full or insane (default: full)
 *   COLONY_FOOD        - Starting food (default: 2)
 *   COLONY_SEED        - Seed for a reproducible game
 *   COLONY_DEPLOYMENTS - JSON deployment plan the colony plays
 *   LOG_DIR            - Directory for the game log (default: logs/colonies)
 */

import { SpectatorServer } from './spectator-server';
import { attachColonyLogger, createEngineLogger, getColonyLogger, removeColonyLogger } from './colony-logger';
import { createColony, gameOptionsFromEnv, loadDeploymentPlan, makeGameId } from '../game/setup';
import { createScriptedStrategy } from '../strategy/scripted';
import { consoleEngineLogger } from '../engine/types';

const PORT = parseInt(process.env.PORT || '3002', 10);
const TURN_DELAY_MS = parseInt(process.env.TURN_DELAY_MS || '1000', 10);

async function main(): Promise<void> {
  const options = gameOptionsFromEnv(process.env);
  const gameId = makeGameId(options);
  const logger = getColonyLogger(gameId, options.logDir ?? undefined);

  const deployments = options.deploymentsFile ? loadDeploymentPlan(options.deploymentsFile) : [];
  const colony = createColony(
    options,
    createScriptedStrategy(deployments),
    createEngineLogger(logger, consoleEngineLogger)
  );
  logger.gameStarted(options.layout, options.plan, options.food);
  attachColonyLogger(colony, logger);

  const server = new SpectatorServer(colony, { gameId, turnDelayMs: TURN_DELAY_MS });
  await server.start(PORT);

  const shutdown = () => {
    console.log('\nShutting down server...');
    server.stop();
    removeColonyLogger(gameId);
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log(`\nSpectator feed ready at ws://localhost:${PORT} (game ${gameId})`);
  const result = await server.run();
  console.log(`Game over: ${result.status} at time ${result.time}`);
  console.log(`Log: ${logger.getLogPath()}`);
  removeColonyLogger(gameId);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
