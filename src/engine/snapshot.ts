/**
 * Read-only views of colony state for renderers and spectators.
 */

import type { AntColony } from './colony';
import type { Insect } from './insects';
import { Water, type Place } from './places';
import type { SimulationStatus } from './types';

export interface InsectSnapshot {
  name: string;
  armor: number;
  damage: number;
  /** Active status effects, outermost last */
  effects: string[];
}

export interface PlaceSnapshot {
  name: string;
  exit: string | null;
  entrance: string | null;
  water: boolean;
  ant: InsectSnapshot | null;
  /** The ant sheltered by the visible one, if any */
  sheltered: InsectSnapshot | null;
  bees: InsectSnapshot[];
}

export interface ColonySnapshot {
  time: number;
  food: number;
  status: SimulationStatus;
  places: PlaceSnapshot[];
  base: PlaceSnapshot;
  antTypes: { name: string; foodCost: number }[];
}

function snapshotInsect(insect: Insect): InsectSnapshot {
  return {
    name: insect.name,
    armor: insect.armor,
    damage: insect.damage,
    effects: insect.behavior.effects.map(effect => `${effect.kind}:${effect.remaining}`),
  };
}

function snapshotPlace(place: Place): PlaceSnapshot {
  const sheltered = place.ant?.contained ?? null;
  return {
    name: place.name,
    exit: place.exit?.name ?? null,
    entrance: place.entrance?.name ?? null,
    water: place instanceof Water,
    ant: place.ant ? snapshotInsect(place.ant) : null,
    sheltered: sheltered ? snapshotInsect(sheltered) : null,
    bees: place.bees.map(snapshotInsect),
  };
}

/**
 * Captures the colony as plain JSON-serializable data.
 */
export function snapshotColony(colony: AntColony): ColonySnapshot {
  return {
    time: colony.time,
    food: colony.food,
    status: colony.status,
    places: [...colony.places.values()].map(snapshotPlace),
    base: snapshotPlace(colony.base),
    antTypes: colony.antTypeNames.map(name => ({
      name,
      foodCost: colony.getAntType(name).foodCost,
    })),
  };
}
