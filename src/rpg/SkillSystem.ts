/**
 * SkillSystem.ts — Skill definitions and skill resolution.
 *
 * Loads skill data from skills.json (validated once, at import time) and
 * resolves a skill cast between two combatants: MP is spent first, then the
 * skill's type decides whether it deals damage, heals, or applies a status
 * effect.
 */

import { z } from 'zod';

import {
  createDamageOverTime,
  createStatModifier,
  createStun,
  type StatusApplication,
} from '@/combat/StatusEffectSystem';
import skillsData from '@/data/skills.json';
import { ContentValidationError, UnknownSkillTypeError } from '@/engine/errors';
import { createLogger } from '@/engine/Logger';
import { uniform, type RandomSource } from '@/engine/Random';
import { BALANCE } from '@/rpg/Balance';
import type { Stats } from '@/rpg/StatSystem';

const log = createLogger('SkillSystem');

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export enum SkillType {
  DAMAGE = 'damage',
  HEAL = 'heal',
  BUFF = 'buff',
  DEBUFF = 'debuff',
  DAMAGE_OVER_TIME = 'damage_over_time',
  STUN = 'stun',
}

/** Which side a skill lands on when cast in an encounter. */
export type SkillTargetSide = 'self' | 'opponent';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const SkillSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  mpCost: z.number().int().min(0),
  type: z.nativeEnum(SkillType),
  power: z.number().min(0).default(0),
  duration: z.number().int().min(0).default(0),
  statusEffectName: z.string().min(1).optional(),
});

const SkillCatalogSchema = z
  .object({ skills: z.array(SkillSchema) })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.skills.forEach((skill, index) => {
      if (seen.has(skill.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate skill id "${skill.id}"`,
          path: ['skills', index, 'id'],
        });
      }
      seen.add(skill.id);

      const lasts =
        skill.type === SkillType.BUFF ||
        skill.type === SkillType.DEBUFF ||
        skill.type === SkillType.DAMAGE_OVER_TIME ||
        skill.type === SkillType.STUN;
      if (lasts && skill.duration < 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${skill.type} skills need a duration of at least 1 turn`,
          path: ['skills', index, 'duration'],
        });
      }
    });
  });

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type SkillDef = Readonly<z.infer<typeof SkillSchema>>;

/** Minimal view of a combatant that skills act on. */
export interface SkillActor {
  readonly name: string;
  readonly stats: Stats;
}

export type SkillOutcome =
  | {
      success: true;
      skill: SkillDef;
      /** Damage dealt, HP reported healed, or the effect's magnitude. */
      amount: number;
      /** Name of the combatant the skill landed on. */
      affected: string;
      /** Set when the skill applied a status effect. */
      status: StatusApplication | null;
      message: string;
    }
  | {
      success: false;
      skill: SkillDef;
      reason: 'not_enough_mp';
      message: string;
    };

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

/**
 * Validate raw skill data.  Every skill type is checked against the closed
 * set here, so an unknown type never reaches combat.
 */
export function parseSkillCatalog(raw: unknown, source: string = 'skills.json'): SkillDef[] {
  const result = SkillCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw ContentValidationError.fromZodIssues(source, result.error.issues);
  }
  return result.data.skills;
}

const skillMap = new Map<string, SkillDef>();

for (const skill of parseSkillCatalog(skillsData)) {
  skillMap.set(skill.id, skill);
}

log.debug({ count: skillMap.size }, 'skill catalog loaded');

/** Look up a skill by id. */
export function getSkill(id: string): SkillDef | undefined {
  return skillMap.get(id);
}

export function getAllSkills(): SkillDef[] {
  return Array.from(skillMap.values());
}

/** Heals and buffs land on the caster's side; everything else on the opponent. */
export function defaultSkillTarget(type: SkillType): SkillTargetSide {
  return type === SkillType.HEAL || type === SkillType.BUFF ? 'self' : 'opponent';
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Cast `skill` from `caster` at `target`.
 *
 * MP is spent before anything else; when the caster cannot pay, nothing
 * changes and the outcome is a decline that must not cost the turn.
 * Magnitudes scale from `floor(caster.effectiveAttack * skill.power)`.
 * Buffs always land on the caster, whatever `target` is.
 */
export function resolveSkill(
  caster: SkillActor,
  target: SkillActor,
  skill: SkillDef,
  rng: RandomSource,
): SkillOutcome {
  if (!caster.stats.useMp(skill.mpCost)) {
    return {
      success: false,
      skill,
      reason: 'not_enough_mp',
      message: `Not enough MP! Need ${skill.mpCost} MP.`,
    };
  }

  const effectAmount = Math.floor(caster.stats.effectiveAttack * skill.power);
  const prefix = `${caster.name} uses ${skill.name}!`;

  switch (skill.type) {
    case SkillType.DAMAGE: {
      const { min, max } = BALANCE.skillVariance;
      const damage = Math.round(effectAmount * uniform(rng, min, max));
      const dealt = target.stats.takeDamage(damage);
      return {
        success: true,
        skill,
        amount: dealt,
        affected: target.name,
        status: null,
        message: `${prefix} Deals ${dealt} damage!`,
      };
    }

    case SkillType.HEAL: {
      const healed = target.stats.heal(effectAmount);
      return {
        success: true,
        skill,
        amount: healed,
        affected: target.name,
        status: null,
        message: `${prefix} Restored ${healed} HP!`,
      };
    }

    case SkillType.BUFF: {
      const power = Math.max(1, effectAmount);
      const status = caster.stats.addStatusEffect(
        createStatModifier(skill.name, 'attack', power, skill.duration),
      );
      return {
        success: true,
        skill,
        amount: power,
        affected: caster.name,
        status,
        message: `${prefix} Attack +${power} for ${skill.duration} turns!`,
      };
    }

    case SkillType.DEBUFF: {
      const power = Math.max(1, effectAmount);
      const status = target.stats.addStatusEffect(
        createStatModifier(skill.name, 'attack', -power, skill.duration),
      );
      return {
        success: true,
        skill,
        amount: power,
        affected: target.name,
        status,
        message: `${prefix} ${target.name}'s attack -${power} for ${skill.duration} turns!`,
      };
    }

    case SkillType.DAMAGE_OVER_TIME: {
      const power = Math.max(1, effectAmount);
      const effectName = skill.statusEffectName ?? skill.name;
      const status = target.stats.addStatusEffect(
        createDamageOverTime(effectName, power, skill.duration),
      );
      return {
        success: true,
        skill,
        amount: power,
        affected: target.name,
        status,
        message: `${prefix} ${target.name} is afflicted with ${effectName}!`,
      };
    }

    case SkillType.STUN: {
      const status = target.stats.addStatusEffect(createStun(skill.duration));
      return {
        success: true,
        skill,
        amount: 0,
        affected: target.name,
        status,
        message: `${prefix} ${target.name} is stunned for ${skill.duration} turns!`,
      };
    }

    default: {
      const unknownType: never = skill.type;
      throw new UnknownSkillTypeError(skill.name, String(unknownType));
    }
  }
}
