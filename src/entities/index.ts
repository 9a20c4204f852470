export { isPlayer, isEnemy, type CombatantBase, type Combatant } from './Combatant';
export { createPlayer, DEFAULT_PLAYER_NAME, type PlayerEntity } from './PlayerEntity';
export {
  createEnemy,
  spawnEnemy,
  spawnRandomEnemy,
  getEnemyTemplate,
  getAllEnemyTemplates,
  parseEnemyCatalog,
  type EnemyEntity,
  type EnemyTemplate,
} from './EnemyEntity';
