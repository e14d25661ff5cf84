/**
 * Ant variants and the registry of deployable ant types.
 */

import { Ant, Bee } from './insects';
import type { Place } from './places';
import type { AntColony } from './colony';
import type { AntContext, AntTypeName, EffectKind } from './types';
import { applyEffect, SLOW_DURATION, STUN_DURATION } from './effects';
import { randomOrNull } from './random';

/**
 * HarvesterAnt produces 1 additional food per turn for the colony.
 */
export class HarvesterAnt extends Ant {
  readonly name: AntTypeName = 'Harvester';
  foodCost = 2;

  action(colony: AntColony): void {
    colony.food += 1;
  }
}

/**
 * ThrowerAnt throws a leaf each turn at the nearest bee in its range.
 */
export class ThrowerAnt extends Ant {
  readonly name: AntTypeName = 'Thrower';
  damage = 1;
  foodCost = 4;
  minRange = 0;
  maxRange = 10;

  /**
   * Finds a bee by following entrances from this ant's place toward the
   * hive. Distance is 0 at the ant's own place. The first place in range
   * that holds bees supplies a random one of them.
   */
  nearestBee(colony: AntColony): Bee | null {
    let place: Place | null = this.place;
    let distance = 0;

    while (place && place !== colony.hive) {
      if (place.bees.length > 0 && distance >= this.minRange && distance <= this.maxRange) {
        return randomOrNull(place.bees, colony.random);
      }
      distance += 1;
      place = place.entrance;
    }
    return null;
  }

  throwAt(target: Bee | null): void {
    if (target) {
      target.reduceArmor(this.damage);
    }
  }

  action(colony: AntColony): void {
    this.throwAt(this.nearestBee(colony));
  }
}

/**
 * A ThrowerAnt that only throws leaves at bees at least 4 places away.
 */
export class LongThrower extends ThrowerAnt {
  readonly name: AntTypeName = 'Long';
  foodCost = 3;
  minRange = 4;
}

/**
 * A ThrowerAnt that only throws leaves at bees within 2 places.
 */
export class ShortThrower extends ThrowerAnt {
  readonly name: AntTypeName = 'Short';
  foodCost = 3;
  maxRange = 2;
}

/**
 * FireAnt burns every bee in its place when it expires.
 */
export class FireAnt extends Ant {
  readonly name: AntTypeName = 'Fire';
  damage = 3;
  foodCost = 4;

  reduceArmor(amount: number): void {
    this.armor -= amount;
    if (this.armor > 0 || !this.place) return;

    const place = this.place;
    for (const bee of [...place.bees]) {
      bee.reduceArmor(this.damage);
    }
    place.removeInsect(this);
  }
}

export class WallAnt extends Ant {
  readonly name: AntTypeName = 'Wall';
  foodCost = 4;

  constructor() {
    super(4);
  }
}

/**
 * NinjaAnt does not block the path and stings every bee in its place.
 */
export class NinjaAnt extends Ant {
  readonly name: AntTypeName = 'Ninja';
  damage = 1;
  foodCost = 6;
  blocksPath = false;

  action(_colony: AntColony): void {
    const place = this.place;
    if (!place) return;
    for (const bee of [...place.bees]) {
      bee.reduceArmor(this.damage);
    }
  }
}

export class ScubaThrower extends ThrowerAnt {
  readonly name: AntTypeName = 'Scuba';
  foodCost = 5;
  watersafe = true;
}

/**
 * HungryAnt eats a random bee in its place outright, then spends
 * `timeToDigest` turns digesting before it can eat again.
 */
export class HungryAnt extends Ant {
  readonly name: AntTypeName = 'Hungry';
  foodCost = 4;
  timeToDigest = 3;
  digesting = 0;

  eatBee(bee: Bee): void {
    bee.reduceArmor(bee.armor);
  }

  action(colony: AntColony): void {
    if (this.digesting > 0) {
      this.digesting -= 1;
      return;
    }
    const place = this.place;
    const bee = place ? randomOrNull(place.bees, colony.random) : null;
    if (bee) {
      this.eatBee(bee);
      this.digesting = this.timeToDigest;
    }
  }
}

/**
 * BodyguardAnt shelters one other ant in its place and acts through it.
 */
export class BodyguardAnt extends Ant {
  readonly name: AntTypeName = 'Bodyguard';
  readonly isContainer = true;
  foodCost = 4;
  private sheltered: Ant | null = null;

  constructor() {
    super(2);
  }

  get contained(): Ant | null {
    return this.sheltered;
  }

  canContain(other: Ant): boolean {
    return this.sheltered === null && !other.isContainer;
  }

  containAnt(ant: Ant): void {
    if (!this.canContain(ant)) {
      throw new Error(`${this} cannot contain ${ant}`);
    }
    this.sheltered = ant;
  }

  releaseAnt(): Ant | null {
    const ant = this.sheltered;
    this.sheltered = null;
    return ant;
  }

  action(colony: AntColony): void {
    if (this.sheltered && this.sheltered.armor > 0) {
      this.sheltered.takeTurn(colony);
    }
  }
}

/**
 * The queen of the colony. A watersafe thrower that doubles the damage of
 * every ant in her tunnel, once per ant.
 *
 * Only the first queen deployed in a colony is the true queen; every later
 * one expires on its first action. The true queen cannot be removed while
 * she lives, and bees that reach her place end the game.
 */
export class QueenAnt extends ScubaThrower {
  readonly name: AntTypeName = 'Queen';
  foodCost = 6;
  readonly trueQueen: boolean;
  readonly doubled = new Set<Ant>();

  constructor(trueQueen: boolean) {
    super();
    this.trueQueen = trueQueen;
  }

  removable(): boolean {
    return !this.trueQueen || this.armor <= 0;
  }

  action(colony: AntColony): void {
    if (!this.trueQueen) {
      this.reduceArmor(this.armor);
      return;
    }
    this.throwAt(this.nearestBee(colony));
    this.doubleTunnelDamage();
  }

  /**
   * Walks the queen's tunnel in both directions, doubling the damage of each
   * ant not yet doubled. A container at a place has the ant it shelters
   * doubled instead of itself.
   */
  doubleTunnelDamage(): void {
    const home = this.place;
    if (!home) return;

    if (home.ant && home.ant !== this) {
      this.doubled.add(home.ant);
    }

    for (let place = home.entrance; place; place = place.entrance) {
      this.doubleAt(place);
    }
    for (let place = home.exit; place; place = place.exit) {
      this.doubleAt(place);
    }
  }

  private doubleAt(place: Place): void {
    const ant = place.ant;
    if (!ant) return;

    if (ant.isContainer) {
      this.doubled.add(ant);
      const sheltered = ant.contained;
      if (sheltered && sheltered !== this && !this.doubled.has(sheltered)) {
        sheltered.damage *= 2;
        this.doubled.add(sheltered);
      }
    } else if (ant !== this && !this.doubled.has(ant)) {
      ant.damage *= 2;
      this.doubled.add(ant);
    }
  }
}

/**
 * Stands in for removal: deploying it clears the place it is deployed to.
 */
export class AntRemover extends Ant {
  readonly name: AntTypeName = 'Remover';

  constructor() {
    super(0);
  }
}

/**
 * A thrower whose leaf applies a status effect instead of damage.
 */
abstract class EffectThrower extends ThrowerAnt {
  protected abstract readonly effect: EffectKind;
  protected abstract readonly duration: number;

  throwAt(target: Bee | null): void {
    if (target) {
      target.behavior = applyEffect(target.behavior, this.effect, this.duration);
    }
  }
}

/**
 * Slows its target: the bee acts only on even turns for 3 turns.
 */
export class SlowThrower extends EffectThrower {
  readonly name: AntTypeName = 'Slow';
  foodCost = 4;
  protected readonly effect: EffectKind = 'slow';
  protected readonly duration = SLOW_DURATION;
}

/**
 * Stuns its target: the bee loses its next action.
 */
export class StunThrower extends EffectThrower {
  readonly name: AntTypeName = 'Stun';
  foodCost = 6;
  protected readonly effect: EffectKind = 'stun';
  protected readonly duration = STUN_DURATION;
}

export interface AntTypeInfo {
  name: AntTypeName;
  foodCost: number;
  create(context: AntContext): Ant;
}

function antType(name: AntTypeName, foodCost: number, create: (context: AntContext) => Ant): AntTypeInfo {
  return { name, foodCost, create };
}

/**
 * Every deployable ant type, in display order.
 */
export const ANT_TYPES: Record<AntTypeName, AntTypeInfo> = {
  Harvester: antType('Harvester', 2, () => new HarvesterAnt()),
  Thrower: antType('Thrower', 4, () => new ThrowerAnt()),
  Long: antType('Long', 3, () => new LongThrower()),
  Short: antType('Short', 3, () => new ShortThrower()),
  Fire: antType('Fire', 4, () => new FireAnt()),
  Wall: antType('Wall', 4, () => new WallAnt()),
  Ninja: antType('Ninja', 6, () => new NinjaAnt()),
  Scuba: antType('Scuba', 5, () => new ScubaThrower()),
  Hungry: antType('Hungry', 4, () => new HungryAnt()),
  Bodyguard: antType('Bodyguard', 4, () => new BodyguardAnt()),
  Queen: antType('Queen', 6, (context) => new QueenAnt(context.claimQueen())),
  Slow: antType('Slow', 4, () => new SlowThrower()),
  Stun: antType('Stun', 6, () => new StunThrower()),
  Remover: antType('Remover', 0, () => new AntRemover()),
};

export function isAntTypeName(value: string): value is AntTypeName {
  return Object.prototype.hasOwnProperty.call(ANT_TYPES, value);
}

/** Every ant type name, in registry order. */
export const ANT_TYPE_NAMES: AntTypeName[] = Object.keys(ANT_TYPES).filter(isAntTypeName);
