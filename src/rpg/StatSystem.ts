/**
 * StatSystem.ts — Resource pools, combat stats and owned status effects.
 *
 * A `Stats` instance belongs to exactly one combatant.  It owns the HP/MP
 * pools, base attack/speed, level/experience, and the status-effect
 * collection whose modifiers feed the effective stats.
 */

import { z } from 'zod';

import {
  StatusEffectCollection,
  type DamageTarget,
  type ModifiableStat,
  type StatusApplication,
  type StatusEffect,
} from '@/combat/StatusEffectSystem';
import { ContentValidationError } from '@/engine/errors';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Values needed to build a Stats container.  Pools default to full. */
export interface StatsInit {
  maxHp: number;
  maxMp: number;
  attack: number;
  speed: number;
  hp?: number;
  mp?: number;
  level?: number;
  exp?: number;
}

/** Plain, detached view of a Stats container for renderers. */
export interface StatsSnapshot {
  hp: number;
  maxHp: number;
  mp: number;
  maxMp: number;
  attack: number;
  speed: number;
  effectiveAttack: number;
  effectiveSpeed: number;
  level: number;
  exp: number;
  statusEffects: StatusEffect[];
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const nonNegativeInt = z.number().int().min(0);

const StatsInitSchema = z
  .object({
    maxHp: nonNegativeInt,
    maxMp: nonNegativeInt,
    attack: nonNegativeInt,
    speed: nonNegativeInt,
    hp: nonNegativeInt.optional(),
    mp: nonNegativeInt.optional(),
    level: z.number().int().min(1).optional(),
    exp: nonNegativeInt.optional(),
  })
  .refine((s) => s.hp === undefined || s.hp <= s.maxHp, {
    message: 'hp must not exceed maxHp',
    path: ['hp'],
  })
  .refine((s) => s.mp === undefined || s.mp <= s.maxMp, {
    message: 'mp must not exceed maxMp',
    path: ['mp'],
  });

// ---------------------------------------------------------------------------
// Stats class
// ---------------------------------------------------------------------------

export class Stats implements DamageTarget {
  public hp: number;
  public maxHp: number;
  public mp: number;
  public maxMp: number;
  public attack: number;
  public speed: number;
  public level: number;
  public exp: number;
  private readonly effects = new StatusEffectCollection();

  constructor(init: StatsInit) {
    this.maxHp = init.maxHp;
    this.maxMp = init.maxMp;
    this.hp = init.hp ?? init.maxHp;
    this.mp = init.mp ?? init.maxMp;
    this.attack = init.attack;
    this.speed = init.speed;
    this.level = init.level ?? 1;
    this.exp = init.exp ?? 0;
  }

  // -----------------------------------------------------------------------
  // Effective stats
  // -----------------------------------------------------------------------

  /** Attack with every active modifier applied, never below 1. */
  get effectiveAttack(): number {
    return Math.max(1, this.attack + this.getStatModifier('attack'));
  }

  /** Speed with every active modifier applied, never below 1. */
  get effectiveSpeed(): number {
    return Math.max(1, this.speed + this.getStatModifier('speed'));
  }

  getStatModifier(stat: ModifiableStat): number {
    return this.effects.modifierTotal(stat);
  }

  // -----------------------------------------------------------------------
  // Resources
  // -----------------------------------------------------------------------

  /**
   * Deal damage.  At least 1 point is always dealt, whatever the input;
   * HP never drops below 0.
   *
   * @returns The damage actually dealt.
   */
  takeDamage(amount: number): number {
    const actual = Math.max(1, amount);
    this.hp = Math.max(0, this.hp - actual);
    return actual;
  }

  /**
   * Restore HP up to `maxHp`.
   *
   * The reported value is `max(1, amount)` regardless of the cap, so near
   * full health it can exceed the HP actually gained.
   */
  heal(amount: number): number {
    const reported = Math.max(1, amount);
    this.hp = Math.min(this.maxHp, this.hp + amount);
    return reported;
  }

  /** Spend MP.  Leaves the pool untouched and returns false when short. */
  useMp(amount: number): boolean {
    if (this.mp < amount) return false;
    this.mp -= amount;
    return true;
  }

  restoreMp(amount: number): void {
    this.mp = Math.min(this.maxMp, this.mp + amount);
  }

  isAlive(): boolean {
    return this.hp > 0;
  }

  // -----------------------------------------------------------------------
  // Status effects
  // -----------------------------------------------------------------------

  /** Frozen copies of the active effects.  Change them through the methods below. */
  get statusEffects(): readonly Readonly<StatusEffect>[] {
    return this.effects.entries();
  }

  getStatusEffect(name: string): Readonly<StatusEffect> | undefined {
    return this.effects.get(name);
  }

  addStatusEffect(effect: Readonly<StatusEffect>): StatusApplication {
    return this.effects.add(effect);
  }

  removeStatusEffect(name: string): boolean {
    return this.effects.remove(name);
  }

  isStunned(): boolean {
    return this.effects.isStunned();
  }

  /** End-of-turn tick; DOT damage goes through `takeDamage`. */
  tickStatusEffects(ownerName?: string): string[] {
    return this.effects.tick(this, ownerName);
  }

  describeStatusEffects(): string {
    return this.effects.describe();
  }

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  snapshot(): StatsSnapshot {
    return {
      hp: this.hp,
      maxHp: this.maxHp,
      mp: this.mp,
      maxMp: this.maxMp,
      attack: this.attack,
      speed: this.speed,
      effectiveAttack: this.effectiveAttack,
      effectiveSpeed: this.effectiveSpeed,
      level: this.level,
      exp: this.exp,
      statusEffects: this.statusEffects.map((e) => ({ ...e })),
    };
  }
}

// ---------------------------------------------------------------------------
// Factory helper
// ---------------------------------------------------------------------------

/**
 * Build a Stats container from content data, rejecting values that break
 * the pool invariants.
 *
 * @param source  Label used in the error message (e.g. `enemy "slime"`).
 */
export function createStats(init: StatsInit, source: string = 'stats'): Stats {
  const result = StatsInitSchema.safeParse(init);
  if (!result.success) {
    throw ContentValidationError.fromZodIssues(source, result.error.issues);
  }
  return new Stats(result.data);
}
