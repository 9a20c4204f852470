// ---------------------------------------------------------------------------
// Combat module — barrel export
// ---------------------------------------------------------------------------

// CombatManager
export {
  CombatState,
  CombatEventType,
  CombatSession,
  startCombat,
  type PlayerAction,
  type TurnOutcome,
  type CombatReward,
  type CombatantSnapshot,
  type SkillMenuEntry,
  type ItemMenuEntry,
  type CombatSnapshot,
  type CombatEvent,
  type CombatEventListener,
  type CombatSessionOptions,
} from './CombatManager';

// CombatActions
export { basicAttack, rollFlee, type AttackResult } from './CombatActions';

// StatusEffectSystem
export {
  StatusEffectType,
  STUN_EFFECT_NAME,
  createStatModifier,
  createDamageOverTime,
  createStun,
  StatusEffectCollection,
  describeStatusEffects,
  type ModifiableStat,
  type StatModifierEffect,
  type DamageOverTimeEffect,
  type StunEffect,
  type StatusEffect,
  type DamageTarget,
  type StatusApplication,
} from './StatusEffectSystem';

// EnemyAI
export { EnemyActionType, decideEnemyAction, type EnemyAction } from './EnemyAI';

// EncounterRunner
export { runEncounter, type CombatRenderer, type ActionSource } from './EncounterRunner';
