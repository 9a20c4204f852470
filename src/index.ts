export * from './engine';
export * from './rpg';
export * from './entities';
export * from './combat';
