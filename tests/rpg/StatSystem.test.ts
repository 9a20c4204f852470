import { describe, it, expect } from 'vitest';
import { createDamageOverTime, createStatModifier, createStun } from '@/combat/StatusEffectSystem';
import { ContentValidationError } from '@/engine/errors';
import { createStats } from '@/rpg/StatSystem';
import { makeStats } from '../helpers';

describe('Stats', () => {
  it('starts with full pools at level 1', () => {
    const stats = makeStats();
    expect(stats.hp).toBe(100);
    expect(stats.mp).toBe(50);
    expect(stats.level).toBe(1);
    expect(stats.exp).toBe(0);
  });

  describe('takeDamage', () => {
    it('always deals at least 1', () => {
      const stats = makeStats();
      expect(stats.takeDamage(0)).toBe(1);
      expect(stats.takeDamage(-5)).toBe(1);
      expect(stats.hp).toBe(98);
    });

    it('floors HP at 0', () => {
      const stats = makeStats({ hp: 10 });
      expect(stats.takeDamage(25)).toBe(25);
      expect(stats.hp).toBe(0);
      expect(stats.isAlive()).toBe(false);
    });
  });

  describe('heal', () => {
    it('caps at maxHp but reports the requested amount', () => {
      const stats = makeStats({ hp: 95 });
      expect(stats.heal(20)).toBe(20);
      expect(stats.hp).toBe(100);
    });

    it('reports at least 1', () => {
      const stats = makeStats({ hp: 50 });
      expect(stats.heal(0)).toBe(1);
      expect(stats.hp).toBe(50);
    });
  });

  describe('MP', () => {
    it('refuses to overspend and leaves the pool untouched', () => {
      const stats = makeStats({ mp: 5 });
      expect(stats.useMp(10)).toBe(false);
      expect(stats.mp).toBe(5);
      expect(stats.useMp(5)).toBe(true);
      expect(stats.mp).toBe(0);
    });

    it('restores up to maxMp', () => {
      const stats = makeStats({ mp: 40 });
      stats.restoreMp(30);
      expect(stats.mp).toBe(50);
    });
  });

  describe('effective stats', () => {
    it('sums every modifier on the stat', () => {
      const stats = makeStats({ attack: 10 });
      stats.addStatusEffect(createStatModifier('Battle Cry', 'attack', 3, 3));
      stats.addStatusEffect(createStatModifier('Crippling Shot', 'attack', -2, 2));
      stats.addStatusEffect(createStatModifier('Haste', 'speed', 4, 2));
      expect(stats.effectiveAttack).toBe(11);
      expect(stats.effectiveSpeed).toBe(14);
    });

    it('never drops below 1', () => {
      const stats = makeStats({ attack: 5 });
      stats.addStatusEffect(createStatModifier('Crippling Shot', 'attack', -10, 2));
      expect(stats.effectiveAttack).toBe(1);
      expect(stats.attack).toBe(5);
    });
  });

  it('reports stuns through its effect collection', () => {
    const stats = makeStats();
    expect(stats.isStunned()).toBe(false);
    stats.addStatusEffect(createStun(1));
    expect(stats.isStunned()).toBe(true);
    expect(stats.removeStatusEffect('Stunned')).toBe(true);
    expect(stats.isStunned()).toBe(false);
  });

  it('snapshots detached copies of its effects', () => {
    const stats = makeStats({ attack: 12 });
    stats.addStatusEffect(createDamageOverTime('Poison', 4, 3));
    const snap = stats.snapshot();
    stats.tickStatusEffects();
    expect(stats.getStatusEffect('Poison')?.duration).toBe(2);
    expect(snap.statusEffects[0].duration).toBe(3);
    expect(snap.effectiveAttack).toBe(12);
  });

  it('exposes its effects as a read-only view', () => {
    const stats = makeStats();
    stats.addStatusEffect(createStun(2));
    const view = stats.statusEffects;

    expect(Object.isFrozen(view)).toBe(true);
    expect(() => Reflect.apply(Array.prototype.push, view, [createStun(1)])).toThrow(TypeError);
    expect(Reflect.set(view[0], 'duration', 9)).toBe(false);
    expect(stats.statusEffects).toEqual([createStun(2)]);
  });
});

describe('createStats', () => {
  it('rejects hp above maxHp', () => {
    expect(() => createStats({ maxHp: 10, maxMp: 0, attack: 1, speed: 1, hp: 11 })).toThrow(
      '[Content] Invalid stats: hp: hp must not exceed maxHp',
    );
  });

  it('rejects negative values', () => {
    expect(() => createStats({ maxHp: 10, maxMp: 0, attack: -1, speed: 1 }, 'enemy "x"')).toThrow(
      ContentValidationError,
    );
  });
});
