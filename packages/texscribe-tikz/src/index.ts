/**
 * texscribe TikZ - drawing primitives for texscribe documents
 *
 * - Capability interfaces (writeable, named, defines named)
 * - Colors, arrow heads and styles
 * - Coordinates
 * - Nodes, labels, paths, circles and graphs
 * - Pictures and scopes with a namespace of named objects
 */

export * from './base.js';
export * from './arrow.js';
export * from './color.js';
export * from './style.js';
export * from './point.js';
export * from './objects.js';
export * from './graph.js';
export * from './picture.js';
