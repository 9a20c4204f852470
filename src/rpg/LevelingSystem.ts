/**
 * LevelingSystem.ts — Experience and level-up growth.
 *
 * Thresholds and growth rates come from balance.json.  A level-up grows
 * max HP, max MP and attack by a fixed fraction (floored), adds a flat
 * speed bonus, and fully restores both pools.
 */

import { BALANCE } from '@/rpg/Balance';
import type { Stats } from '@/rpg/StatSystem';

// ---------------------------------------------------------------------------
// Constants from balance data
// ---------------------------------------------------------------------------

const EXP_PER_LEVEL = BALANCE.leveling.expPerLevel; // 100
const GROWTH_RATE = BALANCE.leveling.growthRate; // 0.1
const SPEED_PER_LEVEL = BALANCE.leveling.speedPerLevel; // 1

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface LevelUpResult {
  previousLevel: number;
  newLevel: number;
  hpGained: number;
  mpGained: number;
  attackGained: number;
  speedGained: number;
}

// ---------------------------------------------------------------------------
// EXP helpers
// ---------------------------------------------------------------------------

/** Total experience at which a character of `level` levels up. */
export function expForNextLevel(level: number): number {
  return level * EXP_PER_LEVEL;
}

/** Progress towards the next level as a 0-1 fraction. */
export function getExpProgress(stats: Pick<Stats, 'exp' | 'level'>): number {
  const needed = expForNextLevel(stats.level);
  if (needed <= 0) return 1;
  return Math.max(0, Math.min(1, stats.exp / needed));
}

// ---------------------------------------------------------------------------
// Leveling
// ---------------------------------------------------------------------------

/**
 * Award experience.
 *
 * Experience is never reset on level-up, and the threshold is checked once
 * per call: a grant large enough to cross two thresholds still yields a
 * single level, and the next grant picks up the remainder.
 *
 * @returns The level-up that happened, or `null`.
 */
export function gainExp(stats: Stats, amount: number): LevelUpResult | null {
  stats.exp += amount;

  if (stats.exp >= expForNextLevel(stats.level)) {
    return levelUp(stats);
  }
  return null;
}

/** Apply one level of growth and restore HP/MP to full. */
export function levelUp(stats: Stats): LevelUpResult {
  const previousLevel = stats.level;
  const hpGained = Math.floor(stats.maxHp * GROWTH_RATE);
  const mpGained = Math.floor(stats.maxMp * GROWTH_RATE);
  const attackGained = Math.floor(stats.attack * GROWTH_RATE);

  stats.level += 1;
  stats.maxHp += hpGained;
  stats.maxMp += mpGained;
  stats.hp = stats.maxHp;
  stats.mp = stats.maxMp;
  stats.attack += attackGained;
  stats.speed += SPEED_PER_LEVEL;

  return {
    previousLevel,
    newLevel: stats.level,
    hpGained,
    mpGained,
    attackGained,
    speedGained: SPEED_PER_LEVEL,
  };
}
