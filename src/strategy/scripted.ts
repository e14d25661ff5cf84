/**
 * Scripted strategy: replays a fixed list of deployments, each on its turn.
 */

import type { AntColony } from '../engine/colony';
import { ColonyError } from '../engine/errors';
import { isAntTypeName } from '../engine/ants';
import type { AntTypeName, Strategy } from '../engine/types';

export type DeploymentStep =
  | { turn: number; place: string; ant: AntTypeName }
  | { turn: number; place: string; remove: true };

export type DeploymentPlan = DeploymentStep[];

/**
 * Applies every step scheduled for the colony's current turn, in plan order.
 * Placement errors propagate: a plan that stacks two ants is broken.
 */
export function createScriptedStrategy(plan: DeploymentPlan): Strategy {
  const byTurn = new Map<number, DeploymentStep[]>();
  for (const step of plan) {
    const steps = byTurn.get(step.turn) ?? [];
    steps.push(step);
    byTurn.set(step.turn, steps);
  }

  return (colony: AntColony) => {
    for (const step of byTurn.get(colony.time) ?? []) {
      if ('remove' in step) {
        colony.removeAnt(step.place);
      } else {
        colony.deployAnt(step.place, step.ant);
      }
    }
  };
}

/**
 * Validates a parsed JSON value as a deployment plan. Accepts a bare array
 * of steps or an object with a `steps` array.
 */
export function parseDeploymentPlan(value: unknown): DeploymentPlan {
  const steps = Array.isArray(value)
    ? value
    : typeof value === 'object' && value !== null && 'steps' in value && Array.isArray(value.steps)
      ? value.steps
      : null;
  if (!steps) {
    throw new ColonyError('Deployment plan must be an array of steps');
  }
  return steps.map((step: unknown, index: number) => parseStep(step, index));
}

function parseStep(step: unknown, index: number): DeploymentStep {
  const fail = (reason: string): never => {
    throw new ColonyError(`Invalid deployment step ${index}: ${reason}`);
  };

  if (typeof step !== 'object' || step === null) {
    return fail('expected an object');
  }
  if (!('turn' in step) || typeof step.turn !== 'number' || !Number.isInteger(step.turn) || step.turn < 0) {
    return fail('turn must be a non-negative integer');
  }
  if (!('place' in step) || typeof step.place !== 'string' || step.place === '') {
    return fail('place must be a non-empty string');
  }
  if ('remove' in step && step.remove === true) {
    return { turn: step.turn, place: step.place, remove: true };
  }
  if (!('ant' in step) || typeof step.ant !== 'string' || !isAntTypeName(step.ant)) {
    return fail('ant must name an ant type');
  }
  return { turn: step.turn, place: step.place, ant: step.ant };
}
