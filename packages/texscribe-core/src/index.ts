/**
 * texscribe core - LaTeX documents as nested, stack-disciplined scopes
 *
 * This is the core library containing:
 * - Error hierarchy
 * - Resource lifecycle (open/closed state machine, scoped use)
 * - Line buffer with indentation and wrapping
 * - Requirement registry for packages and TikZ libraries
 * - Documents, environments and the external compiler runner
 */

export * from './errors.js';
export * from './resource.js';
export * from './handler.js';
export * from './requirements.js';
export * from './utils.js';
export * from './scope.js';
export * from './document.js';
export * from './environment.js';
export * from './compiler.js';
