import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_GAME_OPTIONS,
  createColony,
  gameOptionsFromEnv,
  loadDeploymentPlan,
  makeGameId,
  parseGameArgs,
} from '../setup';
import { ColonyError } from '../../engine/errors';
import { Water } from '../../engine/places';
import { silentEngineLogger } from '../../engine/types';
import { createScriptedStrategy } from '../../strategy/scripted';

const TEST_DIR = join(tmpdir(), 'colony-setup-test');

describe('parseGameArgs', () => {
  it('should default to a dry layout, the test plan and two food', () => {
    expect(parseGameArgs([])).toEqual(DEFAULT_GAME_OPTIONS);
  });

  it('should map short and long flags', () => {
    expect(parseGameArgs(['-t', '-w', '-i'])).toMatchObject({ food: 10, layout: 'wet', plan: 'insane' });
    expect(parseGameArgs(['--ten', '--full', '--water'])).toMatchObject({ food: 10, layout: 'wet', plan: 'full' });
    expect(parseGameArgs(['-h']).help).toBe(true);
  });

  it('should let later flags win', () => {
    expect(parseGameArgs(['-i', '-f']).plan).toBe('full');
  });

  it('should read flag values', () => {
    expect(parseGameArgs(['--seed', '42', '--plan', 'plan.json', '--log-dir', 'out'])).toMatchObject({
      seed: 42,
      deploymentsFile: 'plan.json',
      logDir: 'out',
    });
  });

  it('should reject unknown flags and missing or bad values', () => {
    expect(() => parseGameArgs(['--fast'])).toThrow(new ColonyError('Unknown option --fast'));
    expect(() => parseGameArgs(['--plan'])).toThrow('--plan needs a value');
    expect(() => parseGameArgs(['--seed', 'abc'])).toThrow('--seed must be an integer, got abc');
  });
});

describe('gameOptionsFromEnv', () => {
  it('should default to the wet layout and the full plan', () => {
    expect(gameOptionsFromEnv({})).toMatchObject({ layout: 'wet', plan: 'full', food: 2, seed: null });
  });

  it('should read colony variables', () => {
    const options = gameOptionsFromEnv({
      COLONY_LAYOUT: 'dry',
      COLONY_PLAN: 'insane',
      COLONY_FOOD: '20',
      COLONY_SEED: '7',
      COLONY_DEPLOYMENTS: 'd.json',
      LOG_DIR: 'logs-here',
    });
    expect(options).toMatchObject({
      layout: 'dry',
      plan: 'insane',
      food: 20,
      seed: 7,
      deploymentsFile: 'd.json',
      logDir: 'logs-here',
    });
  });

  it('should reject unknown names', () => {
    expect(() => gameOptionsFromEnv({ COLONY_LAYOUT: 'swamp' })).toThrow('Unknown layout swamp');
    expect(() => gameOptionsFromEnv({ COLONY_PLAN: 'easy' })).toThrow('Unknown assault plan easy');
    expect(() => gameOptionsFromEnv({ COLONY_FOOD: 'lots' })).toThrow(ColonyError);
  });
});

describe('loadDeploymentPlan', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('should read and validate a plan file', () => {
    mkdirSync(TEST_DIR, { recursive: true });
    const path = join(TEST_DIR, 'plan.json');
    writeFileSync(path, JSON.stringify({ steps: [{ turn: 0, place: 'tunnel_0_0', ant: 'Thrower' }] }));

    expect(loadDeploymentPlan(path)).toEqual([{ turn: 0, place: 'tunnel_0_0', ant: 'Thrower' }]);
  });

  it('should wrap unreadable files in a colony error', () => {
    expect(() => loadDeploymentPlan(join(TEST_DIR, 'missing.json'))).toThrow(ColonyError);
  });
});

describe('createColony', () => {
  it('should build the chosen layout and plan', () => {
    const colony = createColony(
      { ...DEFAULT_GAME_OPTIONS, layout: 'wet', plan: 'full', food: 10 },
      () => {},
      silentEngineLogger
    );
    expect(colony.food).toBe(10);
    expect(colony.places.size).toBe(25);
    expect(colony.getPlace('water_1_5')).toBeInstanceOf(Water);
    expect(colony.bees).toHaveLength(15);
  });

  it('should play the same seeded game the same way', async () => {
    const options = { ...DEFAULT_GAME_OPTIONS, plan: 'full' as const, food: 0, seed: 99 };
    const play = async () => {
      const colony = createColony(options, () => {}, silentEngineLogger);
      const entrances: string[] = [];
      colony.onEvent(event => {
        if (event.type === 'WAVE_ENTERED') entrances.push(...event.entrances);
      });
      const result = await colony.simulate();
      return { result, entrances };
    };

    const first = await play();
    const second = await play();
    expect(second).toEqual(first);
    expect(first.result.status).toBe('LOST');
  });

  it('should win the test plan with a scripted defence', async () => {
    const colony = createColony(
      { ...DEFAULT_GAME_OPTIONS, food: 12, seed: 1 },
      createScriptedStrategy([
        { turn: 0, place: 'tunnel_0_0', ant: 'Thrower' },
        { turn: 0, place: 'tunnel_1_0', ant: 'Thrower' },
        { turn: 0, place: 'tunnel_2_0', ant: 'Thrower' },
      ]),
      silentEngineLogger
    );
    expect((await colony.simulate()).status).toBe('WON');
  });
});

describe('makeGameId', () => {
  it('should combine layout, plan and a compact timestamp', () => {
    expect(makeGameId(DEFAULT_GAME_OPTIONS, new Date('2025-01-02T03:04:05.678Z'))).toBe(
      'colony-dry-test-20250102T030405'
    );
  });
});
