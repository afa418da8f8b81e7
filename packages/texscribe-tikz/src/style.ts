/**
 * TikZStyle - immutable option lists
 *
 * A style maps normalized keys to values. Keys are normalized by splitting
 * camelCase words and turning `_` and `-` into spaces, so `lineWidth`,
 * `line_width`, `line-width` and `line width` all name the same option.
 *
 * Rendering lists flags (entries set to `true`) first, then every other entry
 * as `key={value}`. Entries set to `false` are kept in the style but not
 * written.
 *
 * ```ts
 * new TikZStyle({ width: '1cm', draw: true }).toString(); // 'draw, width={1cm}'
 * ```
 */

import { TeXValueError } from 'texscribe-core';
import { TikZColor } from './color.js';
import type { NamedResolver, TikZValue } from './base.js';

export type StyleValue = string | number | boolean | TikZColor;

export interface TikZStyleOptions {
  width?: TikZValue;
  height?: TikZValue;
  xScale?: TikZValue;
  yScale?: TikZValue;
  scale?: TikZValue;
  shift?: readonly [TikZValue, TikZValue];

  bendLeft?: boolean | TikZValue;
  bendRight?: boolean | TikZValue;

  draw?: boolean;
  circle?: boolean;
  rectangle?: boolean;

  dashed?: boolean;
  dotted?: boolean;
  lineWidth?: TikZValue;
  color?: TikZColor;
  fill?: TikZColor;

  align?: string;

  drawOpacity?: number;
  fillOpacity?: number;
}

export type CustomStyleEntries = Readonly<Record<string, StyleValue | undefined>>;

/**
 * Keys of the typed options, normalized
 */
export const KNOWN_STYLE_KEYS: readonly string[] = [
  'width',
  'height',
  'x scale',
  'y scale',
  'scale',
  'shift',
  'bend left',
  'bend right',
  'draw',
  'circle',
  'rectangle',
  'dashed',
  'dotted',
  'line width',
  'color',
  'fill',
  'align',
  'draw opacity',
  'fill opacity',
];

const OPACITY_KEYS = ['draw opacity', 'fill opacity', 'opacity'];

export function normalizeStyleKey(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/[_-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

function formatValue(value: StyleValue): string {
  return value instanceof TikZColor ? value.xcolorName : String(value);
}

function checkEntry(key: string, value: StyleValue): void {
  if (key === '') {
    throw new TeXValueError('Style keys cannot be empty');
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new TeXValueError(`Style value of '${key}' must be a finite number, received ${value}`);
  }
  if (OPACITY_KEYS.includes(key)) {
    if (typeof value !== 'number' || value < 0 || value > 1) {
      throw new TeXValueError(`Style value of '${key}' must be a number in [0, 1], received ${String(value)}`);
    }
  }
}

export class TikZStyle {
  private readonly entries: ReadonlyMap<string, StyleValue>;

  /**
   * @param options typed options
   * @param customEntries any other TikZ options, written after the typed ones
   * @param strict reject custom entries whose key is not one of the typed options
   */
  constructor(options: TikZStyleOptions = {}, customEntries: CustomStyleEntries = {}, strict: boolean = false) {
    const entries = new Map<string, StyleValue>();
    const { shift, ...rest } = options;
    const typed: Record<string, StyleValue | undefined> = {
      ...rest,
      shift: shift === undefined ? undefined : `(${shift[0]}, ${shift[1]})`,
    };

    for (const key of KNOWN_STYLE_KEYS) {
      for (const [name, value] of Object.entries(typed)) {
        if (value !== undefined && normalizeStyleKey(name) === key) {
          checkEntry(key, value);
          entries.set(key, value);
        }
      }
    }

    for (const [name, value] of Object.entries(customEntries)) {
      if (value === undefined) continue;
      const key = normalizeStyleKey(name);
      if (strict && !KNOWN_STYLE_KEYS.includes(key)) {
        throw new TeXValueError(`Unknown style key '${name}'`);
      }
      checkEntry(key, value);
      entries.set(key, value);
    }
    this.entries = entries;
  }

  private static fromEntries(entries: Iterable<readonly [string, StyleValue]>): TikZStyle {
    const custom: Record<string, StyleValue> = {};
    for (const [key, value] of entries) {
      custom[key] = value;
    }
    return new TikZStyle({}, custom);
  }

  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  /**
   * Colors used by this style, each once
   */
  get colors(): TikZColor[] {
    const colors: TikZColor[] = [];
    for (const value of this.entries.values()) {
      if (value instanceof TikZColor && !colors.some((color) => color.equals(value))) {
        colors.push(value);
      }
    }
    return colors;
  }

  get(key: string): StyleValue | undefined {
    return this.entries.get(normalizeStyleKey(key));
  }

  has(key: string): boolean {
    return this.entries.has(normalizeStyleKey(key));
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * A new style whose colors are replaced by `resolve(color)`; the same
   * style when no color changes
   */
  withColors(resolve: NamedResolver): TikZStyle {
    let changed = false;
    const entries: Array<[string, StyleValue]> = [];
    for (const [key, value] of this.entries) {
      if (value instanceof TikZColor) {
        const resolved = resolve(value);
        if (resolved instanceof TikZColor && resolved !== value) {
          entries.push([key, resolved]);
          changed = true;
          continue;
        }
      }
      entries.push([key, value]);
    }
    return changed ? TikZStyle.fromEntries(entries) : this;
  }

  /**
   * A new style with the entries of both; entries of `other` win
   */
  merge(other: TikZStyle): TikZStyle {
    return TikZStyle.fromEntries([...this.entries, ...other.entries]);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof TikZStyle) || other.size !== this.size) {
      return false;
    }
    for (const [key, value] of this.entries) {
      const theirs = other.entries.get(key);
      if (theirs === undefined || typeof theirs !== typeof value || formatValue(theirs) !== formatValue(value)) {
        return false;
      }
    }
    return true;
  }

  toString(): string {
    const flags: string[] = [];
    const pairs: string[] = [];
    for (const [key, value] of this.entries) {
      if (value === true) {
        flags.push(key);
      } else if (value !== false) {
        pairs.push(`${key}={${formatValue(value)}}`);
      }
    }
    return [...flags, ...pairs].join(', ');
  }
}
