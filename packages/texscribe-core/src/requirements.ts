/**
 * Requirement registry
 *
 * Collects the packages and TikZ libraries a document needs. Each document
 * owns one registry; environments and pictures keep their own registry while
 * open and merge it into the document's when they close.
 */

import { TeXValueError } from './errors.js';

/**
 * Anything that needs packages or TikZ libraries to compile
 */
export interface DeclaresRequirements {
  readonly requiredPackages: readonly string[];
  readonly requiredTikzLibraries: readonly string[];
}

export type PackageOptions = string | readonly string[];

function checkName(name: string, kind: string): string {
  const trimmed = name.trim();
  if (trimmed === '' || /[{}\s]/.test(trimmed)) {
    throw new TeXValueError(`Invalid ${kind} name '${name}'`);
  }
  return trimmed;
}

function splitOptions(options: PackageOptions | undefined): string[] {
  if (options === undefined) return [];
  const list = typeof options === 'string' ? options.split(',') : options;
  return list.map((option) => option.trim()).filter((option) => option !== '');
}

export class RequirementRegistry {
  // insertion order of a Map/Set is the order of first request
  private packages = new Map<string, string[]>();
  private libraries = new Set<string>();

  /**
   * Require a package. Requesting a package again adds any new options to
   * the ones already recorded.
   */
  requirePackage(name: string, options?: PackageOptions): void {
    const key = checkName(name, 'package');
    const recorded = this.packages.get(key) ?? [];
    for (const option of splitOptions(options)) {
      if (!recorded.includes(option)) {
        recorded.push(option);
      }
    }
    this.packages.set(key, recorded);
  }

  requireTikzLibrary(name: string): void {
    this.libraries.add(checkName(name, 'TikZ library'));
  }

  /**
   * Record everything `source` declares
   */
  declare(source: DeclaresRequirements): void {
    for (const name of source.requiredPackages) {
      this.requirePackage(name);
    }
    for (const name of source.requiredTikzLibraries) {
      this.requireTikzLibrary(name);
    }
  }

  /**
   * Add every requirement of `other` to this registry
   */
  merge(other: RequirementRegistry): void {
    for (const [name, options] of other.packages) {
      this.requirePackage(name, options);
    }
    for (const library of other.libraries) {
      this.requireTikzLibrary(library);
    }
  }

  hasPackage(name: string): boolean {
    return this.packages.has(name.trim());
  }

  hasTikzLibrary(name: string): boolean {
    return this.libraries.has(name.trim());
  }

  packageOptions(name: string): readonly string[] | undefined {
    return this.packages.get(name.trim());
  }

  get packageNames(): readonly string[] {
    return [...this.packages.keys()];
  }

  get tikzLibraries(): readonly string[] {
    return [...this.libraries];
  }

  get isEmpty(): boolean {
    return this.packages.size === 0 && this.libraries.size === 0;
  }

  /**
   * Preamble lines: every `\usepackage` first, then every `\usetikzlibrary`,
   * since TikZ libraries can only be loaded after the tikz package
   */
  definitionLines(): string[] {
    const lines: string[] = [];
    for (const [name, options] of this.packages) {
      const optionText = options.length > 0 ? `[${options.join(', ')}]` : '';
      lines.push(`\\usepackage${optionText}{${name}}`);
    }
    for (const library of this.libraries) {
      lines.push(`\\usetikzlibrary{${library}}`);
    }
    return lines;
  }
}
