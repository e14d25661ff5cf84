/**
 * Core types for the colony defense engine.
 */

import type { Place } from './places';
import type { Insect } from './insects';
import type { AntColony } from './colony';

export type AntTypeName =
  | 'Harvester'
  | 'Thrower'
  | 'Long'
  | 'Short'
  | 'Fire'
  | 'Wall'
  | 'Ninja'
  | 'Scuba'
  | 'Hungry'
  | 'Bodyguard'
  | 'Queen'
  | 'Slow'
  | 'Stun'
  | 'Remover';

export type SimulationStatus = 'RUNNING' | 'WON' | 'LOST';

export type EffectKind = 'slow' | 'stun';

export interface ActiveEffect {
  kind: EffectKind;
  remaining: number;
}

/**
 * Per-turn behavior of an insect: the stack of status effects wrapped
 * around its base action, outermost last.
 */
export interface Behavior {
  effects: readonly ActiveEffect[];
}

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RNG = () => number;

/**
 * Registers a place with the colony. Bee entrances are linked to the hive.
 */
export type RegisterPlace = (place: Place, isBeeEntrance: boolean) => void;

/**
 * Builds the tunnels of a colony, starting from its base.
 */
export type CreatePlaces = (base: Place, registerPlace: RegisterPlace) => void;

/**
 * Deploys and removes ants once per turn. May wait on input.
 */
export type Strategy = (colony: AntColony) => void | Promise<void>;

/**
 * Receives notice of changes to the place graph it observes.
 */
export interface PlaceObserver {
  insectExpired(insect: Insect, place: Place): void;
}

/**
 * Minimal logging surface used inside the engine.
 */
export interface EngineLogger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleEngineLogger: EngineLogger = {
  info: (message) => console.log(`[colony] ${message}`),
  warn: (message) => console.warn(`[colony] ${message}`),
};

export const silentEngineLogger: EngineLogger = {
  info: () => {},
  warn: () => {},
};

/**
 * Construction context handed to ant factories.
 */
export interface AntContext {
  /** Claims the colony's single authoritative queen slot. True only once per colony. */
  claimQueen(): boolean;
}

export interface SimulationResult {
  status: SimulationStatus;
  time: number;
  food: number;
}

/**
 * Types of events emitted by the colony.
 */
export type ColonyEvent =
  | { type: 'TURN_STARTED'; time: number; food: number }
  | { type: 'WAVE_ENTERED'; time: number; entrances: string[] }
  | { type: 'ANT_DEPLOYED'; time: number; place: string; ant: AntTypeName; food: number }
  | { type: 'DEPLOY_REJECTED'; time: number; place: string; ant: AntTypeName; food: number; cost: number }
  | { type: 'ANT_REMOVED'; time: number; place: string; ant: string }
  | { type: 'INSECT_EXPIRED'; time: number; place: string; insect: string }
  | { type: 'TURN_ENDED'; time: number; ants: number; bees: number; food: number }
  | { type: 'GAME_ENDED'; time: number; status: Exclude<SimulationStatus, 'RUNNING'> };

export type ColonyEventCallback = (event: ColonyEvent) => void;
