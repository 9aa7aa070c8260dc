export { characters } from './characters.js';
export { equipmentItems } from './equipment-items.js';
export { monsterCards } from './monster-cards.js';
export { dungeonRuns } from './dungeon-runs.js';
