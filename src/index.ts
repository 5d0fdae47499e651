// Main entry point for the turn-based combat engine
export * from './config.js';
export * from './math/dice.js';
export * from './schema/combat-action.js';
export * from './schema/combat-handler.js';
export * from './engine/pubsub.js';
export * from './engine/combat/types.js';
export * from './engine/combat/errors.js';
export * from './engine/combat/equipment.js';
export * from './engine/combat/messages.js';
export * from './engine/combat/rules.js';
export * from './engine/combat/actions.js';
export * from './engine/combat/handler.js';
export * from './engine/combat/manager.js';
export * from './engine/combat/ticker.js';
export * from './engine/world/room.js';
export * from './storage/index.js';
