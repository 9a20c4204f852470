/**
 * RPG Core Systems — Barrel export.
 *
 * Re-exports all RPG modules for convenient single-import access.
 */

// Stat System
export { Stats, createStats } from '@/rpg/StatSystem';
export type { StatsInit, StatsSnapshot } from '@/rpg/StatSystem';

// Balance
export { BALANCE, parseBalance } from '@/rpg/Balance';
export type { BalanceConfig, VarianceRange } from '@/rpg/Balance';

// Character Class
export { getClass, getAllClasses, isClassId, parseClassCatalog } from '@/rpg/CharacterClass';
export type { ClassId, ClassBaseStats, CharacterClassDef } from '@/rpg/CharacterClass';

// Inventory System
export {
  Inventory,
  getItem,
  getAllItems,
  isUsableInCombat,
  parseItemCatalog,
} from '@/rpg/InventorySystem';
export type { ItemDef, ItemEffect, ItemUseOutcome } from '@/rpg/InventorySystem';

// Skill System
export {
  SkillType,
  getSkill,
  getAllSkills,
  defaultSkillTarget,
  parseSkillCatalog,
  resolveSkill,
} from '@/rpg/SkillSystem';
export type { SkillDef, SkillActor, SkillOutcome, SkillTargetSide } from '@/rpg/SkillSystem';

// Leveling System
export { expForNextLevel, getExpProgress, gainExp, levelUp } from '@/rpg/LevelingSystem';
export type { LevelUpResult } from '@/rpg/LevelingSystem';
