import type { Stats } from '@/rpg/StatSystem';
import type { EnemyEntity } from '@/entities/EnemyEntity';
import type { PlayerEntity } from '@/entities/PlayerEntity';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fields shared by both sides of an encounter. */
export interface CombatantBase {
  name: string;
  /** Exclusively owned by this combatant. */
  stats: Stats;
  /** Opaque reference for the renderer (sprite key, art id, ...). */
  visual?: string;
}

/** Either side of an encounter. */
export type Combatant = PlayerEntity | EnemyEntity;

export function isPlayer(combatant: Combatant): combatant is PlayerEntity {
  return combatant.kind === 'player';
}

export function isEnemy(combatant: Combatant): combatant is EnemyEntity {
  return combatant.kind === 'enemy';
}
