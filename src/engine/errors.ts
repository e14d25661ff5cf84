/**
 * Errors raised by the colony engine.
 *
 * Only configuration and strategy mistakes throw. Expected game conditions
 * (not enough food, no target in range, an empty place) are no-ops.
 */

export class ColonyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ColonyError';
  }
}

/**
 * Two incompatible ants in one place, or removing an insect from a place
 * it does not occupy.
 */
export class PlacementError extends ColonyError {
  constructor(message: string) {
    super(message);
    this.name = 'PlacementError';
  }
}
