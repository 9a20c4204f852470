// ---------------------------------------------------------------------------
// EnemyAI.ts — Enemy turn decisions
// ---------------------------------------------------------------------------
// Enemies have no skills: they use a basic attack unless they are stunned.
// ---------------------------------------------------------------------------

import type { EnemyEntity } from '@/entities/EnemyEntity';

/** Actions the AI can decide to take. */
export enum EnemyActionType {
  ATTACK = 'ATTACK',
  STUNNED = 'STUNNED',
}

export interface EnemyAction {
  type: EnemyActionType;
}

/** Decide what the enemy does on its phase of the turn. */
export function decideEnemyAction(enemy: EnemyEntity): EnemyAction {
  if (enemy.stats.isStunned()) {
    return { type: EnemyActionType.STUNNED };
  }
  return { type: EnemyActionType.ATTACK };
}
