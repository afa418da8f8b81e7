/**
 * texscribe CLI - JSON document descriptions rendered through texscribe
 */

export * from './schema.js';
export * from './render.js';
export * from './command.js';
