/**
 * Status effects on an insect's per-turn behavior.
 *
 * A behavior is a stack of timed effects around the insect's base action.
 * Applying an effect pushes it on top, so effects applied before an earlier
 * one expires nest inside the later one. Each turn the stack is walked from
 * the outermost effect inward:
 *
 * - an effect with turns remaining spends one and transforms the call
 *   (`stun` swallows it, `slow` lets it through on even turns only);
 * - an exhausted effect passes the call straight inward and is dropped.
 *
 * Reaching the bottom of the stack means the base action runs.
 */

import type { ActiveEffect, Behavior, EffectKind } from './types';

export const SLOW_DURATION = 3;
export const STUN_DURATION = 1;

export const BASE_BEHAVIOR: Behavior = { effects: [] };

export function applyEffect(behavior: Behavior, kind: EffectKind, duration: number): Behavior {
  return { effects: [...behavior.effects, { kind, remaining: duration }] };
}

export interface BehaviorStep {
  behavior: Behavior;
  acts: boolean;
}

/**
 * Advances a behavior by one invocation at the given simulation time.
 */
export function stepBehavior(behavior: Behavior, time: number): BehaviorStep {
  const next: ActiveEffect[] = behavior.effects.map(effect => ({ ...effect }));
  let acts = true;

  for (let i = next.length - 1; i >= 0; i--) {
    const effect = next[i];
    if (effect.remaining <= 0) continue;

    effect.remaining -= 1;
    if (!transformAllows(effect.kind, time)) {
      acts = false;
      break;
    }
  }

  return {
    behavior: { effects: next.filter(effect => effect.remaining > 0) },
    acts,
  };
}

function transformAllows(kind: EffectKind, time: number): boolean {
  switch (kind) {
    case 'slow':
      return time % 2 === 0;
    case 'stun':
      return false;
  }
}

