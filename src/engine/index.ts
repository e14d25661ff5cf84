/**
 * Colony Defense Engine
 *
 * A turn-based tower-defense engine: ants placed along tunnels hold off
 * waves of bees advancing from the hive toward the colony's queen.
 */

// Types
export type {
  AntTypeName,
  SimulationStatus,
  EffectKind,
  ActiveEffect,
  Behavior,
  RNG,
  RegisterPlace,
  CreatePlaces,
  Strategy,
  PlaceObserver,
  EngineLogger,
  AntContext,
  SimulationResult,
  ColonyEvent,
  ColonyEventCallback,
} from './types';

// Constants
export { consoleEngineLogger, silentEngineLogger } from './types';

// Errors
export { ColonyError, PlacementError } from './errors';

// Places and insects
export { Place, Water, Hive } from './places';
export { Insect, Bee, Ant } from './insects';
export {
  HarvesterAnt,
  ThrowerAnt,
  LongThrower,
  ShortThrower,
  FireAnt,
  WallAnt,
  NinjaAnt,
  ScubaThrower,
  HungryAnt,
  BodyguardAnt,
  QueenAnt,
  AntRemover,
  SlowThrower,
  StunThrower,
  ANT_TYPES,
  ANT_TYPE_NAMES,
  isAntTypeName,
} from './ants';
export type { AntTypeInfo } from './ants';

// Status effects
export {
  SLOW_DURATION,
  STUN_DURATION,
  BASE_BEHAVIOR,
  applyEffect,
  stepBehavior,
} from './effects';
export type { BehaviorStep } from './effects';

// Colony
export { AntColony, BASE_PLACE_NAME, DEFAULT_COLONY_CONFIG } from './colony';
export type { ColonyConfig, ColonySetup } from './colony';

// Layouts and assault plans
export {
  mixedLayout,
  testLayout,
  testLayoutMultiTunnels,
  dryLayout,
  wetLayout,
  LAYOUTS,
  DEFAULT_LAYOUT_OPTIONS,
  isLayoutName,
} from './layouts';
export type { LayoutName, LayoutOptions } from './layouts';
export {
  AssaultPlan,
  DEFAULT_BEE_ARMOR,
  makeTestAssaultPlan,
  makeFullAssaultPlan,
  makeInsaneAssaultPlan,
  ASSAULT_PLANS,
  isAssaultPlanName,
} from './assault-plans';
export type { AssaultPlanName } from './assault-plans';

// Randomness
export { makeRng, randomOrNull } from './random';

// Snapshots
export { snapshotColony } from './snapshot';
export type { ColonySnapshot, PlaceSnapshot, InsectSnapshot } from './snapshot';
