/**
 * Assault plans: when and how many bees leave the hive.
 */

import { Bee } from './insects';

export const DEFAULT_BEE_ARMOR = 3;

/**
 * The bees' plan of attack, a mapping from turn to the wave of bees that
 * enters the colony on that turn. The colony reads it and never changes it.
 */
export class AssaultPlan {
  readonly beeArmor: number;
  private readonly waves = new Map<number, Bee[]>();

  constructor(beeArmor = DEFAULT_BEE_ARMOR) {
    this.beeArmor = beeArmor;
  }

  /**
   * Adds count bees with the plan's armor to the wave at time.
   */
  addWave(time: number, count: number): this {
    const bees = Array.from({ length: count }, () => new Bee(this.beeArmor));
    const wave = this.waves.get(time);
    if (wave) {
      wave.push(...bees);
    } else {
      this.waves.set(time, bees);
    }
    return this;
  }

  waveAt(time: number): readonly Bee[] {
    return this.waves.get(time) ?? [];
  }

  get times(): number[] {
    return [...this.waves.keys()].sort((a, b) => a - b);
  }

  get allBees(): Bee[] {
    return this.times.flatMap(time => this.waveAt(time));
  }
}

export function makeTestAssaultPlan(): AssaultPlan {
  return new AssaultPlan().addWave(2, 1).addWave(3, 1);
}

export function makeFullAssaultPlan(): AssaultPlan {
  const plan = new AssaultPlan().addWave(2, 1);
  for (let time = 3; time < 15; time += 2) {
    plan.addWave(time, 1);
  }
  return plan.addWave(15, 8);
}

export function makeInsaneAssaultPlan(): AssaultPlan {
  const plan = new AssaultPlan(4).addWave(1, 2);
  for (let time = 3; time < 15; time++) {
    plan.addWave(time, 1);
  }
  return plan.addWave(15, 20);
}

export const ASSAULT_PLANS = {
  test: makeTestAssaultPlan,
  full: makeFullAssaultPlan,
  insane: makeInsaneAssaultPlan,
} satisfies Record<string, () => AssaultPlan>;

export type AssaultPlanName = keyof typeof ASSAULT_PLANS;

export function isAssaultPlanName(value: string): value is AssaultPlanName {
  return Object.prototype.hasOwnProperty.call(ASSAULT_PLANS, value);
}
