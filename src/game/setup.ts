/**
 * Game setup shared by the command-line runner and the spectator server:
 * option parsing, deployment plan files and colony construction.
 */

import { readFileSync } from 'fs';
import { AntColony } from '../engine/colony';
import { Hive } from '../engine/places';
import { ASSAULT_PLANS, isAssaultPlanName, type AssaultPlanName } from '../engine/assault-plans';
import { LAYOUTS, isLayoutName, type LayoutName } from '../engine/layouts';
import { ColonyError } from '../engine/errors';
import { makeRng } from '../engine/random';
import type { EngineLogger, Strategy } from '../engine/types';
import { parseDeploymentPlan, type DeploymentPlan } from '../strategy/scripted';

export interface GameOptions {
  layout: LayoutName;
  plan: AssaultPlanName;
  food: number;
  /** Seed for reproducible games; null uses Math.random */
  seed: number | null;
  /** JSON file of scripted deployments; null plays interactively */
  deploymentsFile: string | null;
  logDir: string | null;
  help: boolean;
}

export const DEFAULT_GAME_OPTIONS: GameOptions = {
  layout: 'dry',
  plan: 'test',
  food: 2,
  seed: null,
  deploymentsFile: null,
  logDir: null,
  help: false,
};

export const USAGE = `Usage: tsx scripts/run-colony.ts [options]

Options:
  -h, --help         Show this help
  -t, --ten          Start with 10 food
  -f, --full         Full assault plan
  -w, --water        Use a layout with water
  -i, --insane       Insane assault plan
  --seed <n>         Seed the random source
  --plan <file>      Play a JSON deployment plan instead of reading commands
  --log-dir <dir>    Write the game log to this directory`;

function parseInteger(value: string | undefined, name: string): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ColonyError(`${name} must be an integer, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

/**
 * Parses command-line flags. Later flags win over earlier ones.
 */
export function parseGameArgs(args: string[]): GameOptions {
  const options: GameOptions = { ...DEFAULT_GAME_OPTIONS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = (): string => {
      const next = args[i + 1];
      if (next === undefined) {
        throw new ColonyError(`${arg} needs a value`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-t':
      case '--ten':
        options.food = 10;
        break;
      case '-f':
      case '--full':
        options.plan = 'full';
        break;
      case '-w':
      case '--water':
        options.layout = 'wet';
        break;
      case '-i':
      case '--insane':
        options.plan = 'insane';
        break;
      case '--seed':
        options.seed = parseInteger(value(), '--seed');
        break;
      case '--plan':
        options.deploymentsFile = value();
        break;
      case '--log-dir':
        options.logDir = value();
        break;
      default:
        throw new ColonyError(`Unknown option ${arg}`);
    }
  }
  return options;
}

/**
 * Reads options from environment variables for the spectator server.
 */
export function gameOptionsFromEnv(env: NodeJS.ProcessEnv): GameOptions {
  const options: GameOptions = { ...DEFAULT_GAME_OPTIONS, layout: 'wet', plan: 'full' };

  const layout = env.COLONY_LAYOUT;
  if (layout) {
    if (!isLayoutName(layout)) {
      throw new ColonyError(`Unknown layout ${layout}`);
    }
    options.layout = layout;
  }
  const plan = env.COLONY_PLAN;
  if (plan) {
    if (!isAssaultPlanName(plan)) {
      throw new ColonyError(`Unknown assault plan ${plan}`);
    }
    options.plan = plan;
  }
  if (env.COLONY_FOOD) {
    options.food = parseInteger(env.COLONY_FOOD, 'COLONY_FOOD');
  }
  if (env.COLONY_SEED) {
    options.seed = parseInteger(env.COLONY_SEED, 'COLONY_SEED');
  }
  if (env.COLONY_DEPLOYMENTS) {
    options.deploymentsFile = env.COLONY_DEPLOYMENTS;
  }
  if (env.LOG_DIR) {
    options.logDir = env.LOG_DIR;
  }
  return options;
}

export function loadDeploymentPlan(path: string): DeploymentPlan {
  let value: unknown;
  try {
    value = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ColonyError(`Cannot read deployment plan ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseDeploymentPlan(value);
}

/**
 * Builds a colony for the chosen layout and assault plan.
 */
export function createColony(options: GameOptions, strategy: Strategy, logger?: EngineLogger): AntColony {
  return new AntColony({
    strategy,
    hive: new Hive(ASSAULT_PLANS[options.plan]()),
    createPlaces: LAYOUTS[options.layout],
    food: options.food,
    random: options.seed === null ? Math.random : makeRng(options.seed),
    ...(logger ? { logger } : {}),
  });
}

/**
 * A log-friendly game id such as colony-dry-test-20250101T120000.
 */
export function makeGameId(options: GameOptions, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, '');
  return `colony-${options.layout}-${options.plan}-${stamp}`;
}
