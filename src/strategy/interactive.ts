/**
 * Interactive strategy: reads deploy and remove commands from a console
 * each turn until the player types `done`.
 */

import * as readline from 'node:readline';
import type { AntColony } from '../engine/colony';
import { ColonyError } from '../engine/errors';
import type { Strategy } from '../engine/types';

export type Command =
  | { kind: 'deploy'; place: string; ant: string }
  | { kind: 'remove'; place: string }
  | { kind: 'status' }
  | { kind: 'types' }
  | { kind: 'help' }
  | { kind: 'done' };

export const HELP_TEXT = [
  'Commands:',
  '  deploy <place> <ant>   Deploy an ant (alias: d)',
  '  remove <place>         Remove the ant at a place (alias: r)',
  '  status                 Show the colony',
  '  types                  List ant types and their food costs',
  '  help                   Show this help',
  '  done                   End your turn (alias: empty line)',
];

/**
 * Parses one line of input. An empty line ends the turn.
 */
export function parseCommand(line: string): Command {
  const [word = '', ...args] = line.trim().split(/\s+/).filter(part => part !== '');

  switch (word.toLowerCase()) {
    case '':
    case 'done':
      return { kind: 'done' };
    case 'd':
    case 'deploy':
      if (args.length !== 2) {
        throw new ColonyError('Usage: deploy <place> <ant>');
      }
      return { kind: 'deploy', place: args[0], ant: args[1] };
    case 'r':
    case 'remove':
      if (args.length !== 1) {
        throw new ColonyError('Usage: remove <place>');
      }
      return { kind: 'remove', place: args[0] };
    case 'status':
      return { kind: 'status' };
    case 'types':
      return { kind: 'types' };
    case 'help':
      return { kind: 'help' };
    default:
      throw new ColonyError(`Unknown command ${word}. Type help for a list of commands.`);
  }
}

/**
 * Carries out a command against the colony and returns the lines to show.
 */
export function applyCommand(colony: AntColony, command: Command): string[] {
  switch (command.kind) {
    case 'deploy': {
      const antType = colony.getAntType(command.ant);
      if (antType.name === 'Remover') {
        return applyCommand(colony, { kind: 'remove', place: command.place });
      }
      const ant = colony.deployAnt(command.place, antType.name);
      if (!ant) {
        return [`Not enough food to deploy ${antType.name} (cost ${antType.foodCost}, food ${colony.food})`];
      }
      return [`Deployed ${ant} (food ${colony.food})`];
    }
    case 'remove': {
      const place = colony.getPlace(command.place);
      const ant = place.ant;
      if (!ant) {
        return [`No ant at ${place.name}`];
      }
      colony.removeAnt(place.name);
      return ant.place ? [`${ant} cannot be removed`] : [`Removed ${ant.name} from ${place.name}`];
    }
    case 'status':
      return [colony.toString()];
    case 'types':
      return colony.antTypeNames.map(name => `${name} (${colony.getAntType(name).foodCost})`);
    case 'help':
      return [...HELP_TEXT];
    case 'done':
      return [];
  }
}

/**
 * Line-based console for the interactive strategy.
 */
export interface CommandIO {
  /** Resolves to the next line, or null once input has ended. */
  readLine(prompt: string): Promise<string | null>;
  write(line: string): void;
}

/**
 * Plays each turn from commands read through io. Once input ends, every
 * later turn passes without deployments.
 */
export function createInteractiveStrategy(io: CommandIO): Strategy {
  let ended = false;

  return async (colony: AntColony) => {
    if (ended) return;
    io.write(`Turn ${colony.time}, food ${colony.food}`);

    for (;;) {
      const line = await io.readLine('> ');
      if (line === null) {
        ended = true;
        return;
      }

      try {
        const command = parseCommand(line);
        if (command.kind === 'done') return;
        for (const output of applyCommand(colony, command)) {
          io.write(output);
        }
      } catch (err) {
        if (!(err instanceof ColonyError)) throw err;
        io.write(err.message);
      }
    }
  };
}

/**
 * A CommandIO over stdin and stdout. Call close() when the game ends.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): CommandIO & { close(): void } {
  const rl = readline.createInterface({ input, output, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async readLine(prompt: string): Promise<string | null> {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
