import { describe, it, expect, vi } from 'vitest';
import { Bee } from '../insects';
import { Place } from '../places';
import { NinjaAnt, ThrowerAnt, WallAnt } from '../ants';
import { makeColony } from './fixtures';

// ---------------------------------------------------------------------------
// reduceArmor
// ---------------------------------------------------------------------------

describe('Insect.reduceArmor', () => {
  it('should lower armor without leaving while armor remains', () => {
    const place = new Place('p');
    const bee = new Bee(5);
    place.addInsect(bee);
    bee.reduceArmor(2);
    expect(bee.armor).toBe(3);
    expect(bee.place).toBe(place);
  });

  it('should remove the insect exactly once when armor runs out', () => {
    const place = new Place('p');
    const insectExpired = vi.fn();
    place.observer = { insectExpired };
    const bee = new Bee(2);
    place.addInsect(bee);

    bee.reduceArmor(3);
    bee.reduceArmor(1);

    expect(bee.armor).toBe(-2);
    expect(bee.place).toBeNull();
    expect(place.bees).toHaveLength(0);
    expect(insectExpired).toHaveBeenCalledTimes(1);
  });

  it('should remove an ant whose armor runs out', () => {
    const place = new Place('p');
    const wall = new WallAnt();
    place.addInsect(wall);
    wall.reduceArmor(4);
    expect(place.ant).toBeNull();
    expect(wall.place).toBeNull();
  });
});

describe('Insect.toString', () => {
  it('should show name, armor and place', () => {
    const place = new Place('tunnel_0_1');
    const bee = new Bee(3);
    expect(bee.toString()).toBe('Bee(3, None)');
    place.addInsect(bee);
    expect(bee.toString()).toBe('Bee(3, tunnel_0_1)');
    expect(new WallAnt().toString()).toBe('Wall(4, None)');
  });
});

// ---------------------------------------------------------------------------
// Bee
// ---------------------------------------------------------------------------

describe('Bee', () => {
  it('should default to 3 armor and be watersafe', () => {
    const bee = new Bee();
    expect(bee.armor).toBe(3);
    expect(bee.watersafe).toBe(true);
    expect(bee.damage).toBe(1);
  });

  it('should advance to the exit when nothing blocks it', () => {
    const colony = makeColony();
    const bee = new Bee();
    colony.getPlace('tunnel_0_3').addInsect(bee);

    bee.action(colony);

    expect(bee.place).toBe(colony.getPlace('tunnel_0_2'));
    expect(colony.getPlace('tunnel_0_3').bees).toHaveLength(0);
    expect(colony.getPlace('tunnel_0_2').bees).toEqual([bee]);
  });

  it('should sting a blocking ant instead of moving', () => {
    const colony = makeColony();
    const wall = colony.deployAnt('tunnel_0_3', 'Wall');
    const bee = new Bee();
    colony.getPlace('tunnel_0_3').addInsect(bee);

    bee.action(colony);

    expect(bee.place).toBe(colony.getPlace('tunnel_0_3'));
    expect(wall?.armor).toBe(3);
  });

  it('should walk past an ant that does not block', () => {
    const colony = makeColony();
    const ninja = colony.deployAnt('tunnel_0_3', 'Ninja');
    const bee = new Bee();
    colony.getPlace('tunnel_0_3').addInsect(bee);

    expect(bee.blocked()).toBe(false);
    bee.action(colony);

    expect(bee.place).toBe(colony.getPlace('tunnel_0_2'));
    expect(ninja?.armor).toBe(1);
  });

  it('should walk into the base from the last tunnel place', () => {
    const colony = makeColony();
    const bee = new Bee();
    colony.getPlace('tunnel_0_0').addInsect(bee);
    bee.action(colony);
    expect(bee.place).toBe(colony.base);
  });

  it('should stay in the hive', () => {
    const colony = makeColony();
    const bee = new Bee();
    colony.hive.addInsect(bee);
    bee.action(colony);
    expect(bee.place).toBe(colony.hive);
  });

  it('should sting for 1 damage', () => {
    const place = new Place('p');
    const thrower = new ThrowerAnt();
    place.addInsect(thrower);
    new Bee().sting(thrower);
    expect(thrower.armor).toBe(0);
    expect(place.ant).toBeNull();
  });
});

describe('Ant defaults', () => {
  it('should block the path unless it is a ninja', () => {
    expect(new ThrowerAnt().blocksPath).toBe(true);
    expect(new NinjaAnt().blocksPath).toBe(false);
  });

  it('should not contain other ants', () => {
    const thrower = new ThrowerAnt();
    expect(thrower.isContainer).toBe(false);
    expect(thrower.canContain(new WallAnt())).toBe(false);
    expect(thrower.contained).toBeNull();
    expect(() => thrower.containAnt(new WallAnt())).toThrow();
  });
});
