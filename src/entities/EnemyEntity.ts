/**
 * EnemyEntity.ts — Enemy combatants and the enemy catalog.
 *
 * Templates come from enemies.json.  Every encounter spawns a fresh enemy
 * from its template, so damage and effects never leak between fights.
 */

import { z } from 'zod';

import enemiesData from '@/data/enemies.json';
import type { CombatantBase } from '@/entities/Combatant';
import { CombatEngineError, ContentValidationError, UnknownContentError } from '@/engine/errors';
import { createLogger } from '@/engine/Logger';
import { pickOne, type RandomSource } from '@/engine/Random';
import { createStats } from '@/rpg/StatSystem';

const log = createLogger('EnemyEntity');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EnemyEntity extends CombatantBase {
  kind: 'enemy';
  /** Catalog id this enemy was spawned from, if any. */
  templateId?: string;
  readonly expReward: number;
  readonly goldReward: number;
}

const EnemyTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  stats: z.object({
    hp: z.number().int().positive(),
    mp: z.number().int().min(0),
    attack: z.number().int().min(0),
    speed: z.number().int().min(0),
    level: z.number().int().min(1).default(1),
  }),
  expReward: z.number().int().min(0),
  goldReward: z.number().int().min(0),
  visual: z.string().optional(),
});

const EnemyCatalogSchema = z.object({ enemies: z.array(EnemyTemplateSchema).min(1) });

export type EnemyTemplate = Readonly<z.infer<typeof EnemyTemplateSchema>>;

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export function parseEnemyCatalog(raw: unknown, source: string = 'enemies.json'): EnemyTemplate[] {
  const result = EnemyCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw ContentValidationError.fromZodIssues(source, result.error.issues);
  }
  return result.data.enemies;
}

const templateMap = new Map<string, EnemyTemplate>();

for (const template of parseEnemyCatalog(enemiesData)) {
  templateMap.set(template.id, template);
}

log.debug({ count: templateMap.size }, 'enemy catalog loaded');

export function getEnemyTemplate(id: string): EnemyTemplate | undefined {
  return templateMap.get(id);
}

export function getAllEnemyTemplates(): EnemyTemplate[] {
  return Array.from(templateMap.values());
}

// ---------------------------------------------------------------------------
// Spawning
// ---------------------------------------------------------------------------

/** Build a full-health enemy from a template. */
export function createEnemy(template: EnemyTemplate): EnemyEntity {
  return {
    kind: 'enemy',
    name: template.name,
    templateId: template.id,
    stats: createStats(
      {
        maxHp: template.stats.hp,
        maxMp: template.stats.mp,
        attack: template.stats.attack,
        speed: template.stats.speed,
        level: template.stats.level,
      },
      `enemy "${template.id}"`,
    ),
    visual: template.visual,
    expReward: template.expReward,
    goldReward: template.goldReward,
  };
}

/** Spawn a fresh enemy by catalog id. */
export function spawnEnemy(templateId: string): EnemyEntity {
  const template = templateMap.get(templateId);
  if (!template) {
    throw new UnknownContentError('enemy template', templateId);
  }
  return createEnemy(template);
}

/** Spawn a fresh enemy picked uniformly from the catalog. */
export function spawnRandomEnemy(rng: RandomSource): EnemyEntity {
  const template = pickOne(rng, getAllEnemyTemplates());
  if (!template) {
    throw new CombatEngineError('[Content] Enemy catalog is empty');
  }
  return createEnemy(template);
}
