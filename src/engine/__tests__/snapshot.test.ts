import { describe, it, expect } from 'vitest';
import { snapshotColony } from '../snapshot';
import { AssaultPlan } from '../assault-plans';
import { applyEffect } from '../effects';
import { Bee } from '../insects';
import { mixedLayout } from '../layouts';
import { makeColony } from './fixtures';

describe('snapshotColony', () => {
  it('should capture the clock, food and every place', () => {
    const colony = makeColony({ plan: new AssaultPlan().addWave(2, 1) });
    const snapshot = snapshotColony(colony);

    expect(snapshot.time).toBe(0);
    expect(snapshot.food).toBe(100);
    expect(snapshot.status).toBe('RUNNING');
    expect(snapshot.places.map(p => p.name)[0]).toBe('Hive');
    expect(snapshot.places).toHaveLength(9);
    expect(snapshot.base).toEqual({
      name: 'AntQueen',
      exit: null,
      entrance: 'tunnel_0_0',
      water: false,
      ant: null,
      sheltered: null,
      bees: [],
    });
  });

  it('should describe ants, sheltered ants and bees with their effects', () => {
    const colony = makeColony();
    colony.deployAnt('tunnel_0_2', 'Thrower');
    colony.deployAnt('tunnel_0_2', 'Bodyguard');
    const bee = new Bee(2);
    bee.behavior = applyEffect(bee.behavior, 'slow', 3);
    colony.getPlace('tunnel_0_2').addInsect(bee);

    const place = snapshotColony(colony).places.find(p => p.name === 'tunnel_0_2');

    expect(place).toEqual({
      name: 'tunnel_0_2',
      exit: 'tunnel_0_1',
      entrance: 'tunnel_0_3',
      water: false,
      ant: { name: 'Bodyguard', armor: 2, damage: 0, effects: [] },
      sheltered: { name: 'Thrower', armor: 1, damage: 1, effects: [] },
      bees: [{ name: 'Bee', armor: 2, damage: 1, effects: ['slow:3'] }],
    });
  });

  it('should mark water places', () => {
    const colony = makeColony({
      layout: (base, register) => mixedLayout(base, register, { tunnels: 1, moatFrequency: 3 }),
    });
    const water = snapshotColony(colony).places.filter(p => p.water).map(p => p.name);
    expect(water).toEqual(['water_0_2', 'water_0_5']);
  });

  it('should list ant types with their costs', () => {
    const snapshot = snapshotColony(makeColony());
    expect(snapshot.antTypes[0]).toEqual({ name: 'Harvester', foodCost: 2 });
    expect(snapshot.antTypes).toHaveLength(14);
  });

  it('should serialize to JSON and back unchanged', () => {
    const colony = makeColony();
    colony.deployAnt('tunnel_0_0', 'Thrower');
    const snapshot = snapshotColony(colony);
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual(snapshot);
  });
});
