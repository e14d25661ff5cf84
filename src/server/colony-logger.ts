/**
 * Colony Logger - Structured logging for colony games.
 *
 * Writes JSONL logs to logs/colonies/{gameId}.jsonl, one entry per colony
 * event, so finished games can be inspected with view-logs.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, dirname, basename } from 'path';
import type { AntColony } from '../engine/colony';
import type { EngineLogger, SimulationStatus } from '../engine/types';

/**
 * Log event types for colony games.
 */
export type ColonyLogEvent =
  | { type: 'game_started'; gameId: string; layout: string; plan: string; food: number }
  | { type: 'game_ended'; gameId: string; status: Exclude<SimulationStatus, 'RUNNING'>; time: number; food: number }
  | { type: 'turn_started'; time: number; food: number }
  | { type: 'wave_entered'; time: number; entrances: string[] }
  | { type: 'ant_deployed'; time: number; place: string; ant: string; food: number }
  | { type: 'deploy_rejected'; time: number; place: string; ant: string; food: number; cost: number }
  | { type: 'ant_removed'; time: number; place: string; ant: string }
  | { type: 'insect_expired'; time: number; place: string; insect: string }
  | { type: 'turn_ended'; time: number; ants: number; bees: number; food: number }
  | { type: 'error'; error: string; context?: string; stack?: string }
  | { type: 'warning'; message: string; context?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Full log entry with metadata.
 */
export interface ColonyLogEntry {
  timestamp: string;
  gameId: string;
  event: ColonyLogEvent;
}

const LOG_EVENT_TYPES: ReadonlySet<string> = new Set<ColonyLogEvent['type']>([
  'game_started', 'game_ended', 'turn_started', 'wave_entered', 'ant_deployed',
  'deploy_rejected', 'ant_removed', 'insect_expired', 'turn_ended', 'error',
  'warning', 'debug',
]);

function defaultLogsDir(): string {
  return join(process.cwd(), 'logs', 'colonies');
}

/**
 * Logger for a single colony game.
 */
export class ColonyLogger {
  private gameId: string;
  private logPath: string;
  private enabled: boolean;

  constructor(gameId: string, logsDir?: string) {
    this.gameId = gameId;
    const baseDir = logsDir || defaultLogsDir();
    this.logPath = join(baseDir, `${gameId}.jsonl`);
    this.enabled = true;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Logs an event to the colony log file.
   */
  log(event: ColonyLogEvent): void {
    if (!this.enabled) return;

    const entry: ColonyLogEntry = {
      timestamp: new Date().toISOString(),
      gameId: this.gameId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[ColonyLogger] Failed to write log: ${error}`);
    }
  }

  gameStarted(layout: string, plan: string, food: number): void {
    this.log({ type: 'game_started', gameId: this.gameId, layout, plan, food });
  }

  error(error: string, context?: string, stack?: string): void {
    this.log({ type: 'error', error, context, stack });
  }

  warning(message: string, context?: string): void {
    this.log({ type: 'warning', message, context });
  }

  debug(message: string, data?: unknown): void {
    this.log({ type: 'debug', message, data });
  }

  getGameId(): string {
    return this.gameId;
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Disables logging (for tests).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

/**
 * Registry of active colony loggers.
 */
const loggers = new Map<string, ColonyLogger>();

/**
 * Gets or creates a logger for a game.
 */
export function getColonyLogger(gameId: string, logsDir?: string): ColonyLogger {
  let logger = loggers.get(gameId);
  if (!logger) {
    logger = new ColonyLogger(gameId, logsDir);
    loggers.set(gameId, logger);
  }
  return logger;
}

export function removeColonyLogger(gameId: string): void {
  loggers.delete(gameId);
}

export function getActiveColonyIds(): string[] {
  return Array.from(loggers.keys());
}

function isColonyLogEntry(value: unknown): value is ColonyLogEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('timestamp' in value) || typeof value.timestamp !== 'string') return false;
  if (!('gameId' in value) || typeof value.gameId !== 'string') return false;
  if (!('event' in value) || typeof value.event !== 'object' || value.event === null) return false;
  return 'type' in value.event && typeof value.event.type === 'string' && LOG_EVENT_TYPES.has(value.event.type);
}

function parseLine(line: string): ColonyLogEntry | null {
  try {
    const value: unknown = JSON.parse(line);
    return isColonyLogEntry(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Reads all log entries from a colony log file. Lines that are not valid
 * entries are skipped.
 */
export function readColonyLogs(gameId: string, logsDir?: string): ColonyLogEntry[] {
  const logPath = join(logsDir || defaultLogsDir(), `${gameId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  return content
    .split('\n')
    .filter(line => line.trim().length > 0)
    .map(parseLine)
    .filter((entry): entry is ColonyLogEntry => entry !== null);
}

/**
 * Reads the last N log entries from a colony log file.
 */
export function readRecentColonyLogs(gameId: string, count: number = 50, logsDir?: string): ColonyLogEntry[] {
  return readColonyLogs(gameId, logsDir).slice(-count);
}

/**
 * Lists all available colony log files.
 */
export function listColonyLogs(logsDir?: string): { gameId: string; path: string; size: number }[] {
  const baseDir = logsDir || defaultLogsDir();

  if (!existsSync(baseDir)) {
    return [];
  }

  return readdirSync(baseDir)
    .filter(f => f.endsWith('.jsonl'))
    .sort()
    .map(f => {
      const fullPath = join(baseDir, f);
      return {
        gameId: basename(f, '.jsonl'),
        path: fullPath,
        size: statSync(fullPath).size,
      };
    });
}

export function filterLogsByType(logs: ColonyLogEntry[], types: ColonyLogEvent['type'][]): ColonyLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}

export function getColonyErrors(gameId: string, logsDir?: string): ColonyLogEntry[] {
  return filterLogsByType(readColonyLogs(gameId, logsDir), ['error']);
}

/**
 * Writes every colony event to logger. Returns a function that detaches it.
 */
export function attachColonyLogger(colony: AntColony, logger: ColonyLogger): () => void {
  return colony.onEvent(event => {
    switch (event.type) {
      case 'TURN_STARTED':
        logger.log({ type: 'turn_started', time: event.time, food: event.food });
        break;
      case 'WAVE_ENTERED':
        logger.log({ type: 'wave_entered', time: event.time, entrances: event.entrances });
        break;
      case 'ANT_DEPLOYED':
        logger.log({ type: 'ant_deployed', time: event.time, place: event.place, ant: event.ant, food: event.food });
        break;
      case 'DEPLOY_REJECTED':
        logger.log({
          type: 'deploy_rejected',
          time: event.time,
          place: event.place,
          ant: event.ant,
          food: event.food,
          cost: event.cost,
        });
        break;
      case 'ANT_REMOVED':
        logger.log({ type: 'ant_removed', time: event.time, place: event.place, ant: event.ant });
        break;
      case 'INSECT_EXPIRED':
        logger.log({ type: 'insect_expired', time: event.time, place: event.place, insect: event.insect });
        break;
      case 'TURN_ENDED':
        logger.log({ type: 'turn_ended', time: event.time, ants: event.ants, bees: event.bees, food: event.food });
        break;
      case 'GAME_ENDED':
        logger.log({ type: 'game_ended', gameId: logger.getGameId(), status: event.status, time: event.time, food: colony.food });
        break;
    }
  });
}

/**
 * An engine logger that prints through console and records warnings in the
 * colony log.
 */
export function createEngineLogger(logger: ColonyLogger, output: EngineLogger): EngineLogger {
  return {
    info: (message) => output.info(message),
    warn: (message) => {
      output.warn(message);
      logger.warning(message, 'engine');
    },
  };
}
