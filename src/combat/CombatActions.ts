// ---------------------------------------------------------------------------
// CombatActions.ts — Basic attack and flee resolution
// ---------------------------------------------------------------------------

import type { CombatantBase } from '@/entities/Combatant';
import { uniform, type RandomSource } from '@/engine/Random';
import { BALANCE } from '@/rpg/Balance';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Result of a basic attack. */
export interface AttackResult {
  attacker: string;
  target: string;
  /** Damage actually dealt (at least 1). */
  damage: number;
  targetAlive: boolean;
  message: string;
}

// ---------------------------------------------------------------------------
// Basic attack
// ---------------------------------------------------------------------------

/**
 * Strike with effective attack scaled by a random variance
 * (`attackVariance` in balance.json, 0.8–1.2 by default).
 *
 * Costs nothing and cannot fail; the target always loses at least 1 HP.
 */
export function basicAttack(
  attacker: CombatantBase,
  target: CombatantBase,
  rng: RandomSource,
): AttackResult {
  const { min, max } = BALANCE.attackVariance;
  const raw = Math.round(attacker.stats.effectiveAttack * uniform(rng, min, max));
  const damage = target.stats.takeDamage(raw);

  return {
    attacker: attacker.name,
    target: target.name,
    damage,
    targetAlive: target.stats.isAlive(),
    message: `${attacker.name} attacks ${target.name} for ${damage} damage!`,
  };
}

// ---------------------------------------------------------------------------
// Flee
// ---------------------------------------------------------------------------

/** Roll an escape attempt: succeeds when the roll is strictly below `fleeChance`. */
export function rollFlee(rng: RandomSource, chance: number = BALANCE.fleeChance): boolean {
  return rng.next() < chance;
}
