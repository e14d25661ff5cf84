/**
 * The ant colony: owns the places, the food budget and the clock, and runs
 * the turn loop until the bees are all gone or one reaches the queen.
 */

import { Ant, Bee, Insect } from './insects';
import { Place, Hive } from './places';
import { ANT_TYPES, ANT_TYPE_NAMES, QueenAnt, isAntTypeName, type AntTypeInfo } from './ants';
import { ColonyError } from './errors';
import { randomOrNull } from './random';
import {
  consoleEngineLogger,
  type AntTypeName,
  type ColonyEvent,
  type ColonyEventCallback,
  type CreatePlaces,
  type EngineLogger,
  type PlaceObserver,
  type RNG,
  type SimulationResult,
  type SimulationStatus,
  type Strategy,
} from './types';

export const BASE_PLACE_NAME = 'AntQueen';

/**
 * Configuration for an ant colony.
 */
export interface ColonyConfig {
  /** Starting food */
  food: number;
  /** Ant types this colony may deploy */
  antTypes: AntTypeName[];
  /** Source of randomness for targeting and wave entrances */
  random: RNG;
  logger: EngineLogger;
}

export const DEFAULT_COLONY_CONFIG: ColonyConfig = {
  food: 2,
  antTypes: ANT_TYPE_NAMES,
  random: Math.random,
  logger: consoleEngineLogger,
};

export interface ColonySetup extends Partial<ColonyConfig> {
  strategy: Strategy;
  hive: Hive;
  createPlaces: CreatePlaces;
}

export class AntColony implements PlaceObserver {
  time = 0;
  food: number;
  status: SimulationStatus = 'RUNNING';
  readonly hive: Hive;
  /** The colony's protected base at the end of every tunnel. */
  readonly base: Place;
  readonly places = new Map<string, Place>();
  readonly beeEntrances: Place[] = [];
  readonly random: RNG;

  private readonly strategy: Strategy;
  private readonly antTypes: Map<AntTypeName, AntTypeInfo>;
  private readonly logger: EngineLogger;
  private readonly eventCallbacks: ColonyEventCallback[] = [];
  private queenClaimed = false;
  private trueQueenPlace: Place | null = null;

  constructor(setup: ColonySetup) {
    const config = { ...DEFAULT_COLONY_CONFIG, ...setup };
    this.strategy = setup.strategy;
    this.hive = setup.hive;
    this.food = config.food;
    this.random = config.random;
    this.logger = config.logger;
    this.antTypes = new Map(config.antTypes.map(name => [name, ANT_TYPES[name]]));

    this.base = new Place(BASE_PLACE_NAME);
    this.base.observer = this;
    this.configure(setup.createPlaces);
  }

  private configure(createPlaces: CreatePlaces): void {
    const registerPlace = (place: Place, isBeeEntrance: boolean): void => {
      if (this.places.has(place.name)) {
        throw new ColonyError(`Duplicate place name ${place.name}`);
      }
      place.observer = this;
      this.places.set(place.name, place);
      if (isBeeEntrance) {
        if (place.entrance) {
          throw new ColonyError(`Bee entrance ${place.name} already has entrance ${place.entrance.name}`);
        }
        place.linkEntrance(this.hive);
        this.beeEntrances.push(place);
      }
    };
    registerPlace(this.hive, false);
    createPlaces(this.base, registerPlace);
  }

  /**
   * Registers an event listener.
   */
  onEvent(callback: ColonyEventCallback): () => void {
    this.eventCallbacks.push(callback);
    return () => {
      const idx = this.eventCallbacks.indexOf(callback);
      if (idx !== -1) {
        this.eventCallbacks.splice(idx, 1);
      }
    };
  }

  private emit(event: ColonyEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (err) {
        this.logger.warn(`Event callback error: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /**
   * Plays the game until it is won or lost.
   */
  async simulate(): Promise<SimulationResult> {
    this.updateStatus();
    while (this.status === 'RUNNING') {
      await this.playTurn();
    }
    return this.result();
  }

  /**
   * Plays a single turn, for front ends that drive the clock themselves.
   * Does nothing once the game is over.
   */
  async step(): Promise<SimulationResult> {
    this.updateStatus();
    if (this.status === 'RUNNING') {
      await this.playTurn();
    }
    return this.result();
  }

  private async playTurn(): Promise<void> {
    this.emit({ type: 'TURN_STARTED', time: this.time, food: this.food });

    this.beesInvade();
    await this.strategy(this);

    for (const ant of this.ants) {
      if (ant.armor > 0) {
        ant.takeTurn(this);
      }
    }
    for (const bee of this.bees) {
      if (bee.armor > 0) {
        bee.takeTurn(this);
      }
    }

    this.emit({
      type: 'TURN_ENDED',
      time: this.time,
      ants: this.ants.length,
      bees: this.bees.length,
      food: this.food,
    });
    this.time += 1;
    this.updateStatus();
  }

  /**
   * Moves the wave scheduled for the current turn from the hive to random
   * bee entrances.
   */
  private beesInvade(): void {
    const wave = this.hive.assaultPlan.waveAt(this.time);
    const entered: string[] = [];
    for (const bee of wave) {
      if (bee.place !== this.hive) continue;
      const entrance = randomOrNull(this.beeEntrances, this.random);
      if (!entrance) {
        throw new ColonyError('The colony has no bee entrances');
      }
      bee.moveTo(entrance);
      entered.push(entrance.name);
    }
    if (entered.length > 0) {
      this.emit({ type: 'WAVE_ENTERED', time: this.time, entrances: entered });
    }
  }

  private updateStatus(): void {
    if (this.status !== 'RUNNING') return;

    if (this.queenUnderAttack()) {
      this.status = 'LOST';
      this.logger.info('The ant queen has perished. Please try again.');
    } else if (this.bees.length === 0) {
      this.status = 'WON';
      this.logger.info('All bees are vanquished. You win!');
    } else {
      return;
    }
    this.emit({ type: 'GAME_ENDED', time: this.time, status: this.status });
  }

  /**
   * True if a bee has reached the base or the true queen's place.
   */
  queenUnderAttack(): boolean {
    return this.protectedPlaces.some(place => place.bees.length > 0);
  }

  /**
   * Where the true queen was deployed. Stays set after she dies: a bee
   * reaching her place still loses the game.
   */
  get queenPlace(): Place | null {
    return this.trueQueenPlace;
  }

  get protectedPlaces(): Place[] {
    const places = [this.base];
    const queenPlace = this.trueQueenPlace;
    if (queenPlace && queenPlace !== this.base) {
      places.push(queenPlace);
    }
    return places;
  }

  /**
   * Places an ant if enough food is available. Returns the new ant, or null
   * when the colony cannot afford it or the type only removes.
   */
  deployAnt(placeName: string, antTypeName: string): Ant | null {
    const place = this.getPlace(placeName);
    const antType = this.getAntType(antTypeName);

    if (antType.name === 'Remover') {
      this.removeAnt(placeName);
      return null;
    }

    if (this.food < antType.foodCost) {
      this.logger.info(`Not enough food remains to place ${antType.name}`);
      this.emit({
        type: 'DEPLOY_REJECTED',
        time: this.time,
        place: place.name,
        ant: antType.name,
        food: this.food,
        cost: antType.foodCost,
      });
      return null;
    }

    const ant = antType.create({ claimQueen: () => this.claimQueen() });
    try {
      place.addInsect(ant);
    } catch (err) {
      if (ant instanceof QueenAnt && ant.trueQueen) {
        this.queenClaimed = false;
      }
      throw err;
    }
    if (ant instanceof QueenAnt && ant.trueQueen) {
      this.trueQueenPlace = place;
    }

    this.food -= antType.foodCost;
    this.emit({ type: 'ANT_DEPLOYED', time: this.time, place: place.name, ant: antType.name, food: this.food });
    return ant;
  }

  private claimQueen(): boolean {
    if (this.queenClaimed) return false;
    this.queenClaimed = true;
    return true;
  }

  /**
   * Removes the visible ant at a place, if any.
   */
  removeAnt(placeName: string): void {
    const place = this.getPlace(placeName);
    const ant = place.ant;
    if (!ant) return;

    place.removeInsect(ant);
    if (ant.place === null) {
      this.emit({ type: 'ANT_REMOVED', time: this.time, place: place.name, ant: ant.name });
    }
  }

  insectExpired(insect: Insect, place: Place): void {
    this.logger.info(`${insect.name}(${insect.armor}, ${place.name}) ran out of armor and expired`);
    this.emit({ type: 'INSECT_EXPIRED', time: this.time, place: place.name, insect: insect.name });
  }

  /**
   * Looks up a registered place. The base is not registered: no ant may
   * stand there.
   */
  getPlace(name: string): Place {
    const place = this.places.get(name);
    if (!place) {
      throw new ColonyError(`Unknown place ${name}`);
    }
    return place;
  }

  getAntType(name: string): AntTypeInfo {
    const antType = isAntTypeName(name) ? this.antTypes.get(name) : undefined;
    if (!antType) {
      throw new ColonyError(`Unknown ant type ${name}`);
    }
    return antType;
  }

  get antTypeNames(): AntTypeName[] {
    return [...this.antTypes.keys()];
  }

  /**
   * Visible ants, in place registration order.
   */
  get ants(): Ant[] {
    const ants: Ant[] = [];
    for (const place of this.places.values()) {
      if (place.ant) ants.push(place.ant);
    }
    return ants;
  }

  /**
   * Every bee, the hive's included, in place registration order.
   */
  get bees(): Bee[] {
    const bees: Bee[] = [];
    for (const place of [...this.places.values(), this.base]) {
      bees.push(...place.bees);
    }
    return bees;
  }

  get insects(): Insect[] {
    return [...this.ants, ...this.bees];
  }

  result(): SimulationResult {
    return { status: this.status, time: this.time, food: this.food };
  }

  toString(): string {
    const insects = this.insects.map(insect => insect.toString());
    return `[${insects.join(', ')}] (Food: ${this.food}, Time: ${this.time})`;
  }
}
