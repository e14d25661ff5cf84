/**
 * Shared builders for engine tests.
 */

import { AntColony } from '../colony';
import { AssaultPlan } from '../assault-plans';
import { Hive } from '../places';
import { testLayout } from '../layouts';
import { silentEngineLogger, type CreatePlaces, type RNG, type Strategy } from '../types';

export interface TestColonyOptions {
  plan?: AssaultPlan;
  layout?: CreatePlaces;
  food?: number;
  strategy?: Strategy;
  random?: RNG;
}

/**
 * A colony on the one-tunnel test layout (tunnel_0_0 next to the base,
 * tunnel_0_7 the bee entrance) with plenty of food and a random source that
 * always picks the first candidate.
 */
export function makeColony(options: TestColonyOptions = {}): AntColony {
  return new AntColony({
    strategy: options.strategy ?? (() => {}),
    hive: new Hive(options.plan ?? new AssaultPlan()),
    createPlaces: options.layout ?? testLayout,
    food: options.food ?? 100,
    random: options.random ?? (() => 0),
    logger: silentEngineLogger,
  });
}
