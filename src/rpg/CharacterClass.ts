/**
 * CharacterClass.ts — Playable class loadouts.
 *
 * A class is pure data: starting stats, an ordered skill list and starting
 * items, all loaded from classes.json.  Skill and item references are
 * resolved against their catalogs at load time.
 */

import { z } from 'zod';

import classesData from '@/data/classes.json';
import { ContentValidationError } from '@/engine/errors';
import { createLogger } from '@/engine/Logger';
import { getItem, type ItemDef } from '@/rpg/InventorySystem';
import { getSkill, type SkillDef } from '@/rpg/SkillSystem';

const log = createLogger('CharacterClass');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ClassId = 'warrior' | 'ranger' | 'wizard' | 'thief';

const CLASS_IDS = ['warrior', 'ranger', 'wizard', 'thief'] as const satisfies readonly ClassId[];

export interface ClassBaseStats {
  hp: number;
  mp: number;
  attack: number;
  speed: number;
}

export interface CharacterClassDef {
  id: ClassId;
  name: string;
  description: string;
  baseStats: Readonly<ClassBaseStats>;
  skills: readonly SkillDef[];
  startingItems: readonly ItemDef[];
}

// ---------------------------------------------------------------------------
// Internal data mapping
// ---------------------------------------------------------------------------

const RawClassSchema = z.object({
  id: z.enum(CLASS_IDS),
  name: z.string().min(1),
  description: z.string(),
  baseStats: z.object({
    hp: z.number().int().positive(),
    mp: z.number().int().min(0),
    attack: z.number().int().min(0),
    speed: z.number().int().min(0),
  }),
  skills: z.array(z.string()),
  startingItems: z.array(z.string()).default([]),
});

const RawClassCatalogSchema = z.object({ classes: z.array(RawClassSchema) });

type RawClassEntry = z.infer<typeof RawClassSchema>;

function mapRawToClassDef(raw: RawClassEntry, source: string): CharacterClassDef {
  const issues: string[] = [];

  const skills: SkillDef[] = [];
  for (const id of raw.skills) {
    const skill = getSkill(id);
    if (skill) skills.push(skill);
    else issues.push(`${raw.id}.skills: unknown skill "${id}"`);
  }

  const startingItems: ItemDef[] = [];
  for (const id of raw.startingItems) {
    const item = getItem(id);
    if (item) startingItems.push(item);
    else issues.push(`${raw.id}.startingItems: unknown item "${id}"`);
  }

  if (issues.length > 0) {
    throw new ContentValidationError(source, issues);
  }

  return {
    id: raw.id,
    name: raw.name,
    description: raw.description,
    baseStats: { ...raw.baseStats },
    skills,
    startingItems,
  };
}

/**
 * Validate raw class data and resolve its skill/item references.
 * Throws `ContentValidationError` on the first malformed class.
 */
export function parseClassCatalog(raw: unknown, source: string = 'classes.json'): CharacterClassDef[] {
  const result = RawClassCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw ContentValidationError.fromZodIssues(source, result.error.issues);
  }
  return result.data.classes.map((entry) => mapRawToClassDef(entry, source));
}

// ---------------------------------------------------------------------------
// Pre-loaded class map
// ---------------------------------------------------------------------------

const classMap = new Map<ClassId, CharacterClassDef>();

for (const def of parseClassCatalog(classesData)) {
  classMap.set(def.id, def);
}

log.debug({ count: classMap.size }, 'class catalog loaded');

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Get a single class definition by id.
 * Returns undefined if the id is not found.
 */
export function getClass(id: ClassId): CharacterClassDef | undefined {
  return classMap.get(id);
}

/** All classes in the order they appear in classes.json. */
export function getAllClasses(): CharacterClassDef[] {
  return Array.from(classMap.values());
}

/** Narrow an arbitrary string (e.g. menu input) to a known class id. */
export function isClassId(value: string): value is ClassId {
  return CLASS_IDS.some((id) => id === value);
}
