/**
 * The place graph: tunnels of places joined by exits (toward the colony base)
 * and entrances (toward the hive).
 */

import { Ant, Bee, Insect } from './insects';
import { PlacementError } from './errors';
import type { PlaceObserver } from './types';
import type { AssaultPlan } from './assault-plans';

export class Place {
  readonly name: string;
  readonly exit: Place | null;
  bees: Bee[] = [];
  /** The ant visible from outside. A sheltering ant hides the one it shelters. */
  ant: Ant | null = null;
  observer: PlaceObserver | null = null;
  private entranceLink: Place | null = null;

  constructor(name: string, exit: Place | null = null) {
    this.name = name;
    this.exit = exit;
    if (exit) {
      exit.linkEntrance(this);
    }
  }

  /**
   * The place bees come from, one step further from the base.
   */
  get entrance(): Place | null {
    return this.entranceLink;
  }

  /**
   * Sets the entrance back-link. Written once: where tunnels converge on one
   * place, the first tunnel built keeps the link.
   */
  linkEntrance(place: Place): void {
    if (!this.entranceLink) {
      this.entranceLink = place;
    }
  }

  isHive(): boolean {
    return false;
  }

  /**
   * Adds an insect to this place.
   *
   * Any number of bees may share a place. At most one ant may, unless one of
   * the two is a container that can shelter the other.
   */
  addInsect(insect: Insect): void {
    if (insect instanceof Ant) {
      this.addAnt(insect);
    } else if (insect instanceof Bee) {
      this.bees.push(insect);
    }
    insect.place = this;
  }

  private addAnt(ant: Ant): void {
    const current = this.ant;
    if (!current) {
      this.ant = ant;
    } else if (current.canContain(ant)) {
      current.containAnt(ant);
    } else if (ant.canContain(current)) {
      ant.containAnt(current);
      this.ant = ant;
    } else {
      throw new PlacementError(`Two ants in ${this.name}`);
    }
  }

  /**
   * Removes an insect from this place.
   *
   * Removing a container promotes the ant it shelters. Removing an ant that
   * is not removable leaves everything as it was.
   */
  removeInsect(insect: Insect): void {
    if (insect instanceof Ant) {
      if (!insect.removable()) return;
      this.removeAnt(insect);
    } else if (insect instanceof Bee) {
      const index = this.bees.indexOf(insect);
      if (index === -1) {
        throw new PlacementError(`${insect} is not in ${this.name}`);
      }
      this.bees.splice(index, 1);
    }

    insect.place = null;
    if (insect.armor <= 0) {
      this.observer?.insectExpired(insect, this);
    }
  }

  private removeAnt(ant: Ant): void {
    const current = this.ant;
    if (current === ant) {
      const sheltered = ant.releaseAnt();
      this.ant = sheltered;
      if (sheltered) {
        sheltered.place = this;
      }
    } else if (current && current.contained === ant) {
      current.releaseAnt();
    } else {
      throw new PlacementError(`${ant} is not in ${this.name}`);
    }
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Water drowns every insect that is not watersafe as soon as it arrives.
 */
export class Water extends Place {
  addInsect(insect: Insect): void {
    super.addInsect(insect);
    if (!insect.watersafe) {
      insect.reduceArmor(insect.armor);
    }
  }
}

/**
 * The place from which the bees launch their assault. Holds every bee of the
 * plan until its wave enters the colony.
 */
export class Hive extends Place {
  readonly assaultPlan: AssaultPlan;

  constructor(assaultPlan: AssaultPlan) {
    super('Hive');
    this.assaultPlan = assaultPlan;
    for (const bee of assaultPlan.allBees) {
      this.addInsect(bee);
    }
  }

  isHive(): boolean {
    return true;
  }

  addInsect(insect: Insect): void {
    if (insect instanceof Ant) {
      throw new PlacementError(`Cannot place ${insect} in the Hive`);
    }
    super.addInsect(insect);
  }
}
