/**
 * Insects: the shared base of ants and bees, and the bee itself.
 */

import type { Place } from './places';
import type { AntColony } from './colony';
import type { AntTypeName, Behavior } from './types';
import { BASE_BEHAVIOR, stepBehavior } from './effects';

export abstract class Insect {
  abstract readonly name: string;

  armor: number;
  /** Written only by Place.addInsect and Place.removeInsect. */
  place: Place | null = null;
  damage = 0;
  foodCost = 0;
  watersafe = false;
  blocksPath = false;
  behavior: Behavior = BASE_BEHAVIOR;

  constructor(armor: number) {
    this.armor = armor;
  }

  /**
   * Reduces armor by amount. An insect left with no armor leaves its place.
   */
  reduceArmor(amount: number): void {
    this.armor -= amount;
    if (this.armor <= 0 && this.place) {
      this.place.removeInsect(this);
    }
  }

  /**
   * Runs this turn's behavior: status effects first, then the action if
   * they let it through.
   */
  takeTurn(colony: AntColony): void {
    const step = stepBehavior(this.behavior, colony.time);
    this.behavior = step.behavior;
    if (step.acts) {
      this.action(colony);
    }
  }

  /**
   * The default action does nothing.
   */
  action(_colony: AntColony): void {}

  toString(): string {
    return `${this.name}(${this.armor}, ${this.place ? this.place.name : 'None'})`;
  }
}

export class Bee extends Insect {
  readonly name: string = 'Bee';

  constructor(armor = 3) {
    super(armor);
    this.damage = 1;
    this.watersafe = true;
  }

  sting(ant: Ant): void {
    ant.reduceArmor(this.damage);
  }

  moveTo(place: Place): void {
    if (this.place) {
      this.place.removeInsect(this);
    }
    place.addInsect(this);
  }

  /**
   * True if the ant in this bee's place stands in its way.
   */
  blocked(): boolean {
    const ant = this.place?.ant;
    return ant != null && ant.blocksPath;
  }

  /**
   * Stings the ant that blocks the way, or advances toward the base.
   */
  action(_colony: AntColony): void {
    const place = this.place;
    if (!place) return;

    if (place.ant && this.blocked()) {
      this.sting(place.ant);
    } else if (!place.isHive() && this.armor > 0 && place.exit) {
      this.moveTo(place.exit);
    }
  }
}

export abstract class Ant extends Insect {
  abstract readonly name: AntTypeName;
  readonly isContainer: boolean = false;

  constructor(armor = 1) {
    super(armor);
    this.blocksPath = true;
  }

  /**
   * True if this ant can shelter other in its place.
   */
  canContain(_other: Ant): boolean {
    return false;
  }

  /**
   * The ant sheltered by this one, if any.
   */
  get contained(): Ant | null {
    return null;
  }

  containAnt(_ant: Ant): void {
    throw new Error(`${this.name} cannot contain another ant`);
  }

  releaseAnt(): Ant | null {
    return null;
  }

  /**
   * False while this ant must not be taken off the board.
   */
  removable(): boolean {
    return true;
  }
}
