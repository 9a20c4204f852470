import type { RandomSource } from '@/engine/Random';
import { createEnemy, type EnemyEntity, type EnemyTemplate } from '@/entities/EnemyEntity';
import { getItem, type ItemDef } from '@/rpg/InventorySystem';
import { getSkill, type SkillDef } from '@/rpg/SkillSystem';
import { Stats, type StatsInit } from '@/rpg/StatSystem';

// ---------------------------------------------------------------------------
// Shared test helpers
// ---------------------------------------------------------------------------

/**
 * Random source replaying `values` in order, wrapping around at the end.
 * A single value of 0.5 makes every variance roll exactly 1.0.
 */
export function createSequenceRandom(...values: number[]): RandomSource & { readonly calls: number } {
  if (values.length === 0) throw new Error('createSequenceRandom needs at least one value');
  let calls = 0;
  return {
    get calls(): number {
      return calls;
    },
    next(): number {
      const value = values[calls % values.length] ?? 0;
      calls += 1;
      return value;
    },
  };
}

export function makeStats(overrides: Partial<StatsInit> = {}): Stats {
  return new Stats({ maxHp: 100, maxMp: 50, attack: 10, speed: 10, ...overrides });
}

export function makeEnemy(overrides: Partial<EnemyTemplate> = {}): EnemyEntity {
  const template: EnemyTemplate = {
    id: 'training-dummy',
    name: 'Training Dummy',
    stats: { hp: 50, mp: 0, attack: 8, speed: 5, level: 1 },
    expReward: 10,
    goldReward: 5,
    ...overrides,
  };
  return createEnemy(template);
}

export function requireSkill(id: string): SkillDef {
  const skill = getSkill(id);
  if (!skill) throw new Error(`missing skill ${id}`);
  return skill;
}

export function requireItem(id: string): ItemDef {
  const item = getItem(id);
  if (!item) throw new Error(`missing item ${id}`);
  return item;
}
