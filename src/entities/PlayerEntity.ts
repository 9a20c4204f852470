import type { CombatantBase } from '@/entities/Combatant';
import { UnknownContentError } from '@/engine/errors';
import { getClass, isClassId, type ClassId } from '@/rpg/CharacterClass';
import { Inventory } from '@/rpg/InventorySystem';
import type { SkillDef } from '@/rpg/SkillSystem';
import { createStats } from '@/rpg/StatSystem';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The player-controlled combatant. */
export interface PlayerEntity extends CombatantBase {
  kind: 'player';
  classId: ClassId;
  /** Display name of the class, e.g. "Warrior". */
  className: string;
  inventory: Inventory;
  /** Fixed by the class at creation. */
  readonly skills: readonly SkillDef[];
  gold: number;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Default hero name when the player leaves it blank. */
export const DEFAULT_PLAYER_NAME = 'Hero';

/**
 * Create a level-1 player from a class loadout: full pools, the class's
 * skill list, and its starting items.
 */
export function createPlayer(name: string, classId: string): PlayerEntity {
  const classDef = isClassId(classId) ? getClass(classId) : undefined;
  if (!classDef) {
    throw new UnknownContentError('class', classId);
  }

  const { baseStats } = classDef;
  const trimmed = name.trim();
  const playerName = trimmed.length > 0 ? trimmed : DEFAULT_PLAYER_NAME;

  return {
    kind: 'player',
    name: playerName,
    classId: classDef.id,
    className: classDef.name,
    stats: createStats(
      {
        maxHp: baseStats.hp,
        maxMp: baseStats.mp,
        attack: baseStats.attack,
        speed: baseStats.speed,
      },
      `class "${classId}"`,
    ),
    inventory: new Inventory(classDef.startingItems),
    skills: classDef.skills,
    gold: 0,
  };
}
