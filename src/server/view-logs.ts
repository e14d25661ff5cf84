#!/usr/bin/env npx tsx
/**
 * CLI tool to view colony logs.
 *
 * Usage:
 *   npx tsx src/server/view-logs.ts                     # List all colony logs
 *   npx tsx src/server/view-logs.ts <gameId>            # View logs for a game
 *   npx tsx src/server/view-logs.ts <gameId> --errors   # View only errors
 *   npx tsx src/server/view-logs.ts <gameId> --tail 20  # View last 20 entries
 *   npx tsx src/server/view-logs.ts <gameId> --type ant_deployed,insect_expired
 *   npx tsx src/server/view-logs.ts ... --dir <logsDir>
 */

import {
  listColonyLogs,
  readColonyLogs,
  readRecentColonyLogs,
  getColonyErrors,
  filterLogsByType,
  type ColonyLogEntry,
  type ColonyLogEvent,
} from './colony-logger';

const LOG_TYPES: ColonyLogEvent['type'][] = [
  'game_started', 'game_ended', 'turn_started', 'wave_entered', 'ant_deployed',
  'deploy_rejected', 'ant_removed', 'insect_expired', 'turn_ended', 'error',
  'warning', 'debug',
];

function isLogType(value: string): value is ColonyLogEvent['type'] {
  return LOG_TYPES.some(type => type === value);
}

function formatTimestamp(ts: string): string {
  return new Date(ts).toLocaleTimeString();
}

function formatEvent(entry: ColonyLogEntry): string {
  const time = formatTimestamp(entry.timestamp);
  const event = entry.event;

  switch (event.type) {
    case 'game_started':
      return `${time} [START] ${event.gameId}: layout=${event.layout} plan=${event.plan} food=${event.food}`;
    case 'game_ended':
      return `${time} [END] ${event.status} at time ${event.time} (food ${event.food})`;
    case 'turn_started':
      return `${time} [TURN] ${event.time} food=${event.food}`;
    case 'wave_entered':
      return `${time} [WAVE] ${event.entrances.length} bees at ${event.entrances.join(', ')}`;
    case 'ant_deployed':
      return `${time} [DEPLOY] ${event.ant} at ${event.place} (food ${event.food})`;
    case 'deploy_rejected':
      return `${time} [REJECT] ${event.ant} at ${event.place}: cost ${event.cost}, food ${event.food}`;
    case 'ant_removed':
      return `${time} [REMOVE] ${event.ant} from ${event.place}`;
    case 'insect_expired':
      return `${time} [EXPIRED] ${event.insect} at ${event.place}`;
    case 'turn_ended':
      return `${time} [TURN] ${event.time} ended: ${event.ants} ants, ${event.bees} bees, food=${event.food}`;
    case 'error':
      return `${time} [ERROR] ${event.error} (${event.context || 'no context'})`;
    case 'warning':
      return `${time} [WARN] ${event.message}`;
    case 'debug':
      return `${time} [DEBUG] ${event.message}`;
  }
}

function printLogs(logs: ColonyLogEntry[]): void {
  for (const entry of logs) {
    console.log(formatEvent(entry));
  }
}

function main() {
  const dirIdx = process.argv.indexOf('--dir');
  const logsDir = dirIdx !== -1 ? process.argv[dirIdx + 1] : undefined;
  const args = process.argv.slice(2).filter((_, i, all) => all[i] !== '--dir' && all[i - 1] !== '--dir');

  // No args - list all game logs
  if (args.length === 0) {
    const logs = listColonyLogs(logsDir);
    if (logs.length === 0) {
      console.log('No colony logs found in logs/colonies/');
      console.log('Logs are written by scripts/run-colony.ts and the spectator server.');
      return;
    }
    console.log('Available colony logs:');
    console.log('─'.repeat(60));
    for (const log of logs) {
      const sizeKB = (log.size / 1024).toFixed(1);
      console.log(`  ${log.gameId} (${sizeKB} KB)`);
    }
    console.log('─'.repeat(60));
    console.log(`\nUse: npx tsx src/server/view-logs.ts <gameId>`);
    return;
  }

  const gameId = args[0];
  const hasErrors = args.includes('--errors');
  const tailIdx = args.indexOf('--tail');
  const typeIdx = args.indexOf('--type');

  let logs: ColonyLogEntry[];

  if (hasErrors) {
    logs = getColonyErrors(gameId, logsDir);
    console.log(`Errors for game ${gameId}:`);
  } else if (tailIdx !== -1) {
    const count = parseInt(args[tailIdx + 1] || '20', 10);
    logs = readRecentColonyLogs(gameId, count, logsDir);
    console.log(`Last ${count} entries for game ${gameId}:`);
  } else {
    logs = readColonyLogs(gameId, logsDir);
    console.log(`All logs for game ${gameId}:`);
  }

  if (typeIdx !== -1) {
    const types = (args[typeIdx + 1] ?? '').split(',').filter(isLogType);
    logs = filterLogsByType(logs, types);
    console.log(`Filtered by type: ${types.join(', ')}`);
  }

  if (logs.length === 0) {
    console.log('No log entries found.');
    return;
  }

  console.log('─'.repeat(60));
  printLogs(logs);
  console.log('─'.repeat(60));
  console.log(`Total: ${logs.length} entries`);
}

main();
