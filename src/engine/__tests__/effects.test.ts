import { describe, it, expect } from 'vitest';
import {
  applyEffect,
  stepBehavior,
  BASE_BEHAVIOR,
  SLOW_DURATION,
  STUN_DURATION,
} from '../effects';
import type { Behavior } from '../types';
import { Bee } from '../insects';
import { makeColony } from './fixtures';

/**
 * Steps a behavior once per turn from startTime, returning whether the base
 * action ran on each turn and the final behavior.
 */
function run(behavior: Behavior, startTime: number, turns: number): { acted: boolean[]; behavior: Behavior } {
  const acted: boolean[] = [];
  let current = behavior;
  for (let time = startTime; time < startTime + turns; time++) {
    const step = stepBehavior(current, time);
    acted.push(step.acts);
    current = step.behavior;
  }
  return { acted, behavior: current };
}

describe('stepBehavior', () => {
  it('should always act without effects', () => {
    expect(run(BASE_BEHAVIOR, 0, 4).acted).toEqual([true, true, true, true]);
  });

  it('should skip exactly one action when stunned for one turn', () => {
    const stunned = applyEffect(BASE_BEHAVIOR, 'stun', STUN_DURATION);
    const { acted, behavior } = run(stunned, 5, 4);
    expect(acted).toEqual([false, true, true, true]);
    expect(behavior.effects).toHaveLength(0);
  });

  it('should act only on even turns while slowed', () => {
    const slowed = applyEffect(BASE_BEHAVIOR, 'slow', SLOW_DURATION);
    const { acted, behavior } = run(slowed, 1, 6);
    // turns 1, 2, 3 are slowed; 4, 5, 6 are not
    expect(acted).toEqual([false, true, false, true, true, true]);
    expect(behavior.effects).toHaveLength(0);
  });

  it('should count down an effect once per invocation', () => {
    const slowed = applyEffect(BASE_BEHAVIOR, 'slow', 3);
    const first = stepBehavior(slowed, 0);
    expect(first.behavior.effects).toEqual([{ kind: 'slow', remaining: 2 }]);
    const second = stepBehavior(first.behavior, 1);
    expect(second.behavior.effects).toEqual([{ kind: 'slow', remaining: 1 }]);
  });

  it('should nest a later effect around an earlier one', () => {
    const slowed = applyEffect(BASE_BEHAVIOR, 'slow', 3);
    const both = applyEffect(slowed, 'stun', 1);
    expect(both.effects.map(e => e.kind)).toEqual(['slow', 'stun']);

    // The stun swallows turn 2 before the slow is reached
    const first = stepBehavior(both, 2);
    expect(first.acts).toBe(false);
    expect(first.behavior.effects).toEqual([{ kind: 'slow', remaining: 3 }]);

    // Then the slow runs its full course
    const { acted } = run(first.behavior, 3, 4);
    expect(acted).toEqual([false, true, false, true]);
  });

  it('should spend both nested slows on an even turn', () => {
    const twice = applyEffect(applyEffect(BASE_BEHAVIOR, 'slow', 1), 'slow', 1);
    const step = stepBehavior(twice, 4);
    expect(step.acts).toBe(true);
    expect(step.behavior.effects).toHaveLength(0);
  });

  it('should not modify the behavior it is given', () => {
    const slowed = applyEffect(BASE_BEHAVIOR, 'slow', 2);
    stepBehavior(slowed, 0);
    expect(slowed.effects).toEqual([{ kind: 'slow', remaining: 2 }]);
    expect(BASE_BEHAVIOR.effects).toHaveLength(0);
  });
});

describe('Insect.takeTurn with effects', () => {
  it('should hold a stunned bee in place for one turn', () => {
    const colony = makeColony();
    const bee = new Bee();
    colony.getPlace('tunnel_0_5').addInsect(bee);
    bee.behavior = applyEffect(bee.behavior, 'stun', 1);

    bee.takeTurn(colony);
    expect(bee.place?.name).toBe('tunnel_0_5');

    bee.takeTurn(colony);
    expect(bee.place?.name).toBe('tunnel_0_4');
  });

  it('should move a slowed bee only on even turns', () => {
    const colony = makeColony();
    const bee = new Bee();
    colony.getPlace('tunnel_0_7').addInsect(bee);
    bee.behavior = applyEffect(bee.behavior, 'slow', 3);

    const positions: string[] = [];
    for (let time = 1; time <= 5; time++) {
      colony.time = time;
      bee.takeTurn(colony);
      positions.push(bee.place?.name ?? 'None');
    }
    expect(positions).toEqual(['tunnel_0_7', 'tunnel_0_6', 'tunnel_0_6', 'tunnel_0_5', 'tunnel_0_4']);
  });
});
