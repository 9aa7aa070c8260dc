export * from './enums.js';
export * from './equipment.js';
export * from './character.js';
export * from './dungeon.js';
export * from './monster-card.js';
