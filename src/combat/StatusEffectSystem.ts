// ---------------------------------------------------------------------------
// StatusEffectSystem.ts — Stat modifiers, DOTs and stuns
// ---------------------------------------------------------------------------
// Pure TypeScript.  Each Stats container owns one StatusEffectCollection,
// which implements the stacking, ticking and expiry rules.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

/** Broad category of a status effect. */
export enum StatusEffectType {
  /** Flat modifier on a named stat (positive = buff, negative = debuff). */
  STAT_MODIFIER = 'stat_mod',
  /** Deals `power` damage on every tick. */
  DAMAGE_OVER_TIME = 'damage_over_time',
  /** Skips the holder's action phase. */
  STUN = 'stun',
}

/** Stats a modifier can target. */
export type ModifiableStat = 'attack' | 'speed';

/** Name given to every stun effect, so repeated stuns refresh one entry. */
export const STUN_EFFECT_NAME = 'Stunned';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

interface StatusEffectBase {
  /** Identity key; a host holds at most one effect per name. */
  name: string;
  /** Turns remaining.  Removed once it reaches 0. */
  duration: number;
}

export interface StatModifierEffect extends StatusEffectBase {
  type: StatusEffectType.STAT_MODIFIER;
  statAffected: ModifiableStat;
  /** Signed flat modifier. */
  power: number;
}

export interface DamageOverTimeEffect extends StatusEffectBase {
  type: StatusEffectType.DAMAGE_OVER_TIME;
  /** Damage per tick.  Accumulates when the same name is re-applied. */
  power: number;
}

export interface StunEffect extends StatusEffectBase {
  type: StatusEffectType.STUN;
  power: 0;
}

export type StatusEffect = StatModifierEffect | DamageOverTimeEffect | StunEffect;

/** Anything a DOT tick can damage. */
export interface DamageTarget {
  takeDamage(amount: number): number;
}

/** What `StatusEffectCollection.add` did with the incoming effect. */
export interface StatusApplication {
  /** Frozen copy of the entry now stored. */
  effect: Readonly<StatusEffect>;
  /** True when an existing entry with the same name was merged into. */
  refreshed: boolean;
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createStatModifier(
  name: string,
  statAffected: ModifiableStat,
  power: number,
  duration: number,
): StatModifierEffect {
  return { name, type: StatusEffectType.STAT_MODIFIER, statAffected, power, duration };
}

export function createDamageOverTime(
  name: string,
  power: number,
  duration: number,
): DamageOverTimeEffect {
  return { name, type: StatusEffectType.DAMAGE_OVER_TIME, power, duration };
}

export function createStun(duration: number, name: string = STUN_EFFECT_NAME): StunEffect {
  return { name, type: StatusEffectType.STUN, power: 0, duration };
}

// ---------------------------------------------------------------------------
// StatusEffectCollection
// ---------------------------------------------------------------------------

/**
 * The effects held by one combatant.
 *
 * Entries are keyed by name: the collection never holds two effects with the
 * same name.  Nothing outside the collection gets a live reference; reads
 * return frozen copies.
 */
export class StatusEffectCollection {
  private readonly _effects: StatusEffect[] = [];

  get size(): number {
    return this._effects.length;
  }

  /** Frozen view of the active effects, in application order. */
  entries(): readonly Readonly<StatusEffect>[] {
    return Object.freeze(this._effects.map((e) => Object.freeze({ ...e })));
  }

  /** The effect with the given name, if present. */
  get(name: string): Readonly<StatusEffect> | undefined {
    const effect = this._effects.find((e) => e.name === name);
    return effect ? Object.freeze({ ...effect }) : undefined;
  }

  // -----------------------------------------------------------------------
  // Apply / Remove
  // -----------------------------------------------------------------------

  /**
   * Apply an effect.
   *
   * Stacking rule (the only one, for every type):
   * - Same name already present → duration becomes the longer of the two,
   *   and for DAMAGE_OVER_TIME the incoming power is added to the stored
   *   power.
   * - Otherwise a copy of the effect is appended.
   */
  add(effect: Readonly<StatusEffect>): StatusApplication {
    const existing = this._effects.find((e) => e.name === effect.name);

    if (existing) {
      existing.duration = Math.max(existing.duration, effect.duration);
      if (effect.type === StatusEffectType.DAMAGE_OVER_TIME && existing.type !== StatusEffectType.STUN) {
        existing.power += effect.power;
      }
      return { effect: Object.freeze({ ...existing }), refreshed: true };
    }

    const copy: StatusEffect = { ...effect };
    this._effects.push(copy);
    return { effect: Object.freeze({ ...copy }), refreshed: false };
  }

  /** Remove the effect with the given name.  No-op when absent. */
  remove(name: string): boolean {
    const idx = this._effects.findIndex((e) => e.name === name);
    if (idx === -1) return false;
    this._effects.splice(idx, 1);
    return true;
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  isStunned(): boolean {
    return this._effects.some((e) => e.type === StatusEffectType.STUN);
  }

  /** Sum of all stat-modifier powers targeting `stat`. */
  modifierTotal(stat: ModifiableStat): number {
    let total = 0;
    for (const e of this._effects) {
      if (e.type === StatusEffectType.STAT_MODIFIER && e.statAffected === stat) {
        total += e.power;
      }
    }
    return total;
  }

  // -----------------------------------------------------------------------
  // Per-turn tick
  // -----------------------------------------------------------------------

  /**
   * Advance every effect by one turn.
   *
   * For each effect present when the tick starts, in order: DOTs deal their
   * power through `target.takeDamage`, then the duration drops by one, and
   * an effect hitting 0 is scheduled for removal.  Removal happens after the
   * whole pass.
   *
   * @param ownerName  When given, messages name the affected combatant.
   * @returns Messages describing damage dealt and effects that wore off.
   */
  tick(target: DamageTarget, ownerName?: string): string[] {
    const messages: string[] = [];
    const expired: string[] = [];

    for (const effect of [...this._effects]) {
      if (effect.type === StatusEffectType.DAMAGE_OVER_TIME) {
        const damage = target.takeDamage(effect.power);
        messages.push(
          ownerName
            ? `[DOT] ${effect.name} deals ${damage} damage to ${ownerName}!`
            : `[DOT] ${effect.name} deals ${damage} damage!`,
        );
      }

      effect.duration -= 1;
      if (effect.duration <= 0) {
        expired.push(effect.name);
        messages.push(
          ownerName ? `[*] ${effect.name} on ${ownerName} wore off!` : `[*] ${effect.name} wore off!`,
        );
      }
    }

    for (const name of expired) {
      this.remove(name);
    }

    return messages;
  }

  describe(): string {
    return describeStatusEffects(this._effects);
  }
}

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

/** One-line summary of active effects for status panels. */
export function describeStatusEffects(effects: readonly Readonly<StatusEffect>[]): string {
  if (effects.length === 0) return 'None';

  return effects
    .map((e) => {
      switch (e.type) {
        case StatusEffectType.STAT_MODIFIER: {
          const sign = e.power > 0 ? '+' : '';
          return `${e.name} ${sign}${e.power} (${e.duration}t)`;
        }
        case StatusEffectType.DAMAGE_OVER_TIME:
          return `${e.name} ${e.power}/turn (${e.duration}t)`;
        case StatusEffectType.STUN:
          return `${e.name} (${e.duration}t)`;
      }
    })
    .join(', ');
}
