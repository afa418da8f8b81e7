/**
 * Capabilities shared by TikZ objects
 *
 * Objects compose these interfaces instead of inheriting from a common base:
 * a node is writeable, named and defines named objects (the colors of its
 * style); a path is writeable and defines named objects (its nodes); a color
 * is writeable and named.
 */

import type { DeclaresRequirements } from 'texscribe-core';

/**
 * A length, scale or other key value as written into TikZ options
 */
export type TikZValue = string | number;

/**
 * Anything that can be written into a picture
 */
export interface TikZWriteable extends DeclaresRequirements {
  toTikZ(): string;
}

/**
 * An object that is defined once per picture and then referenced by name
 */
export interface TikZNamed extends TikZWriteable {
  readonly name: string;
  /** The command that defines the object */
  readonly definition: string;
  /**
   * The same object under a different name
   */
  renamed(name: string): TikZNamed;
}

/**
 * Maps a named object to the instance registered for it in a picture
 */
export type NamedResolver = (object: TikZNamed) => TikZNamed;

/**
 * An object that needs other named objects to be defined before it is used
 */
export interface TikZDefinesNamed extends TikZWriteable {
  readonly requiredNamedObjects: readonly TikZNamed[];
  /**
   * The same object, referring to `resolve(object)` for each named object it uses
   */
  withNamedObjects(resolve: NamedResolver): TikZDefinesNamed;
}

export function isNamed(value: TikZWriteable): value is TikZNamed {
  return 'definition' in value && 'name' in value && 'renamed' in value;
}

export function definesNamed(value: TikZWriteable): value is TikZDefinesNamed {
  return 'requiredNamedObjects' in value;
}

/**
 * Resolve each of `originals` that was registered under another name to its
 * replacement at the same position. Copies of a renamed original (a graph
 * node restyled by the graph) resolve by name. Returns `undefined` when no
 * name changed.
 */
export function namedResolver(
  originals: readonly TikZNamed[],
  replacements: readonly TikZNamed[]
): NamedResolver | undefined {
  const byInstance = new Map<TikZNamed, TikZNamed>();
  const byName = new Map<string, TikZNamed>();
  originals.forEach((original, index) => {
    const replacement = replacements[index];
    if (replacement === undefined || replacement.name === original.name) return;
    byInstance.set(original, replacement);
    if (!byName.has(original.name)) {
      byName.set(original.name, replacement);
    }
  });
  if (byInstance.size === 0) {
    return undefined;
  }
  return (object) => byInstance.get(object) ?? byName.get(object.name) ?? object;
}

/**
 * Collect named objects in order, keeping the first of identical instances
 */
export function uniqueNamed(objects: Iterable<TikZNamed>): TikZNamed[] {
  const result: TikZNamed[] = [];
  for (const object of objects) {
    if (!result.includes(object)) {
      result.push(object);
    }
  }
  return result;
}
