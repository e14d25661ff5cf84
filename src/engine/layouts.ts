/**
 * Colony layouts: functions that build tunnels of places from the base
 * outward and register them with the colony.
 */

import { Place, Water } from './places';
import type { CreatePlaces, RegisterPlace } from './types';

export interface LayoutOptions {
  /** Places per tunnel */
  length: number;
  /** Number of tunnels */
  tunnels: number;
  /** Every moatFrequency-th place is water; 0 for none */
  moatFrequency: number;
}

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  length: 8,
  tunnels: 3,
  moatFrequency: 3,
};

/**
 * Builds tunnels named tunnel_<tunnel>_<step>, with water_<tunnel>_<step>
 * moats at the configured frequency. The place furthest from the base in
 * each tunnel is a bee entrance.
 */
export function mixedLayout(
  base: Place,
  registerPlace: RegisterPlace,
  options: Partial<LayoutOptions> = {}
): void {
  const { length, tunnels, moatFrequency } = { ...DEFAULT_LAYOUT_OPTIONS, ...options };

  for (let tunnel = 0; tunnel < tunnels; tunnel++) {
    let exit = base;
    for (let step = 0; step < length; step++) {
      if (moatFrequency !== 0 && (step + 1) % moatFrequency === 0) {
        exit = new Water(`water_${tunnel}_${step}`, exit);
      } else {
        exit = new Place(`tunnel_${tunnel}_${step}`, exit);
      }
      registerPlace(exit, step === length - 1);
    }
  }
}

export const testLayout: CreatePlaces = (base, registerPlace) =>
  mixedLayout(base, registerPlace, { tunnels: 1, moatFrequency: 0 });

export const testLayoutMultiTunnels: CreatePlaces = (base, registerPlace) =>
  mixedLayout(base, registerPlace, { tunnels: 2, moatFrequency: 0 });

export const dryLayout: CreatePlaces = (base, registerPlace) =>
  mixedLayout(base, registerPlace, { moatFrequency: 0 });

export const wetLayout: CreatePlaces = (base, registerPlace) =>
  mixedLayout(base, registerPlace);

export const LAYOUTS = {
  test: testLayout,
  multi: testLayoutMultiTunnels,
  dry: dryLayout,
  wet: wetLayout,
} satisfies Record<string, CreatePlaces>;

export type LayoutName = keyof typeof LAYOUTS;

export function isLayoutName(value: string): value is LayoutName {
  return Object.prototype.hasOwnProperty.call(LAYOUTS, value);
}
