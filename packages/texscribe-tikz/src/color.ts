/**
 * TikZColor - named xcolor definitions
 *
 * A color has a name, three or four channels (red, green, blue and an
 * optional alpha) and a mode:
 * - `rgb`: channels are numbers in [0, 1]
 * - `RGB`: channels are integers in [0, 255]
 *
 * Colors are immutable. Deriving a color (adding or removing alpha, channel
 * arithmetic) returns a new instance. Two colors are equal when their names
 * are equal.
 */

import { TeXValueError } from 'texscribe-core';
import type { TikZNamed } from './base.js';

export type ColorMode = 'rgb' | 'RGB';

export type ColorValue = readonly [number, number, number] | readonly [number, number, number, number];

export interface ColorOptions {
  /** Append a suffix derived from the channel values to the name */
  generateUniqueName?: boolean;
}

type Operand = number | TikZColor | readonly number[];

function toColorValue(values: readonly number[]): ColorValue {
  if (values.length === 3) {
    return [values[0], values[1], values[2]];
  }
  if (values.length === 4) {
    return [values[0], values[1], values[2], values[3]];
  }
  throw new TeXValueError(`A color needs 3 or 4 channels, received ${values.length}`);
}

/**
 * FNV-1a over the channel values, in base 36
 */
function valueHash(values: readonly number[]): string {
  let hash = 0x811c9dc5;
  for (const ch of values.join(',')) {
    hash ^= ch.charCodeAt(0);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash.toString(36);
}

export class TikZColor implements TikZNamed {
  readonly name: string;
  readonly value: ColorValue;
  readonly mode: ColorMode;
  readonly generateUniqueName: boolean;
  readonly requiredPackages: readonly string[] = ['xcolor'];
  readonly requiredTikzLibraries: readonly string[] = [];

  constructor(name: string, value: readonly number[], mode: ColorMode = 'rgb', options: ColorOptions = {}) {
    if (mode !== 'rgb' && mode !== 'RGB') {
      throw new TeXValueError(`Unknown color mode '${mode}', choose from: rgb, RGB`);
    }
    this.mode = mode;
    this.value = toColorValue(value);
    TikZColor.validate(this.value, mode);
    this.generateUniqueName = options.generateUniqueName ?? false;

    const base = name.trim();
    if (base === '' || /[{}\s!,]/.test(base)) {
      throw new TeXValueError(`Invalid color name '${name}'`);
    }
    this.name = this.generateUniqueName ? `${base}_${valueHash(this.value)}` : base;
  }

  private static validate(value: ColorValue, mode: ColorMode): void {
    for (const channel of value) {
      if (mode === 'rgb' && !(Number.isFinite(channel) && channel >= 0 && channel <= 1)) {
        throw new TeXValueError(`Channels of an 'rgb' color must be numbers in [0, 1], received [${value.join(', ')}]`);
      }
      if (mode === 'RGB' && !(Number.isInteger(channel) && channel >= 0 && channel <= 255)) {
        throw new TeXValueError(
          `Channels of an 'RGB' color must be integers in [0, 255], received [${value.join(', ')}]`
        );
      }
    }
  }

  get red(): number {
    return this.value[0];
  }

  get green(): number {
    return this.value[1];
  }

  get blue(): number {
    return this.value[2];
  }

  get alpha(): number | undefined {
    return this.value.length === 4 ? this.value[3] : undefined;
  }

  get length(): number {
    return this.value.length;
  }

  /**
   * The `\definecolor` command; the alpha channel is not part of it
   */
  get definition(): string {
    return `\\definecolor{${this.name}}{${this.mode}}{${this.red}, ${this.green}, ${this.blue}}`;
  }

  /**
   * Name to use in options: `name`, or `name!percent` when the color has an
   * alpha channel
   */
  get xcolorName(): string {
    const alpha = this.alpha;
    if (alpha === undefined) {
      return this.name;
    }
    const fraction = this.mode === 'RGB' ? alpha / 255 : alpha;
    return `${this.name}!${Math.round(fraction * 100)}`;
  }

  addAlpha(alpha: number): TikZColor {
    if (this.alpha !== undefined) {
      return this;
    }
    return new TikZColor(this.baseName(), [this.red, this.green, this.blue, alpha], this.mode, {
      generateUniqueName: this.generateUniqueName,
    });
  }

  removeAlpha(): TikZColor {
    if (this.alpha === undefined) {
      return this;
    }
    return new TikZColor(this.baseName(), [this.red, this.green, this.blue], this.mode, {
      generateUniqueName: this.generateUniqueName,
    });
  }

  add(other: Operand): TikZColor {
    return this.combine(other, (a, b) => a + b);
  }

  subtract(other: Operand): TikZColor {
    return this.combine(other, (a, b) => a - b);
  }

  multiply(other: Operand): TikZColor {
    return this.combine(other, (a, b) => a * b);
  }

  divide(other: Operand): TikZColor {
    const divisors = this.operands(other);
    if (divisors.some((value) => value === 0)) {
      throw new TeXValueError(`Cannot divide ${this.name} by [${divisors.join(', ')}]`);
    }
    return this.combine(other, (a, b) => a / b);
  }

  renamed(name: string): TikZColor {
    return new TikZColor(name, this.value, this.mode);
  }

  equals(other: unknown): boolean {
    return other instanceof TikZColor && other.name === this.name;
  }

  toTikZ(): string {
    return this.xcolorName;
  }

  toString(): string {
    return this.xcolorName;
  }

  /**
   * Name without the generated suffix
   */
  private baseName(): string {
    if (!this.generateUniqueName) {
      return this.name;
    }
    return this.name.slice(0, this.name.lastIndexOf('_'));
  }

  private operands(other: Operand): number[] {
    const values = other instanceof TikZColor ? [...other.value] : typeof other === 'number' ? [other] : [...other];
    if (!values.every((value) => Number.isFinite(value) && value >= 0)) {
      throw new TeXValueError(`Operands must be numbers >= 0, received [${values.join(', ')}]`);
    }
    if (values.length === 1) {
      return new Array<number>(this.length).fill(values[0]);
    }
    if (values.length !== this.length) {
      throw new TeXValueError(
        `Operand of ${this.name} must have 1 or ${this.length} values, received ${values.length}`
      );
    }
    return values;
  }

  /**
   * Apply `operator` channel by channel, clamping the result to the range of
   * the mode. Results of operations with plain numbers get a generated name.
   */
  private combine(other: Operand, operator: (a: number, b: number) => number): TikZColor {
    const operands = this.operands(other);
    const generateUniqueName =
      other instanceof TikZColor ? this.generateUniqueName || other.generateUniqueName : true;
    const clamp =
      this.mode === 'RGB'
        ? (value: number) => Math.min(Math.max(Math.trunc(value), 0), 255)
        : (value: number) => Math.min(Math.max(value, 0), 1);
    const channels = this.value.map((channel, index) => clamp(operator(channel, operands[index])));
    return new TikZColor(this.baseName(), channels, this.mode, { generateUniqueName });
  }

  static readonly WHITE = new TikZColor('WHITE', [255, 255, 255, 255], 'RGB');
  static readonly ALMOST_WHITE = new TikZColor('ALMOST_WHITE', [245, 245, 245, 255], 'RGB');
  static readonly LIGHT_GRAY = new TikZColor('LIGHT_GRAY', [180, 180, 180, 255], 'RGB');
  static readonly DARK_GRAY = new TikZColor('DARK_GRAY', [45, 45, 45, 255], 'RGB');
  static readonly ALMOST_BLACK = new TikZColor('ALMOST_BLACK', [18, 18, 18, 255], 'RGB');
  static readonly BLACK = new TikZColor('BLACK', [0, 0, 0, 255], 'RGB');
  static readonly RED = new TikZColor('RED', [252, 68, 68, 255], 'RGB');
  static readonly ORANGE = new TikZColor('ORANGE', [255, 165, 0, 255], 'RGB');
  static readonly YELLOW = new TikZColor('YELLOW', [251, 219, 4, 255], 'RGB');
  static readonly GREEN = new TikZColor('GREEN', [139, 195, 74, 255], 'RGB');
  static readonly LIGHT_BLUE = new TikZColor('LIGHT_BLUE', [3, 169, 244, 255], 'RGB');
  static readonly DARK_BLUE = new TikZColor('DARK_BLUE', [4, 60, 140, 255], 'RGB');
  static readonly PURPLE = new TikZColor('PURPLE', [103, 58, 183, 255], 'RGB');
  static readonly MAGENTA = new TikZColor('MAGENTA', [156, 39, 176, 255], 'RGB');
  static readonly PINK = new TikZColor('PINK', [236, 76, 140, 255], 'RGB');
  static readonly ROSE = new TikZColor('ROSE', [252, 140, 132, 255], 'RGB');

  static readonly DEFAULT_COLORS: readonly TikZColor[] = [
    TikZColor.WHITE,
    TikZColor.ALMOST_WHITE,
    TikZColor.LIGHT_GRAY,
    TikZColor.DARK_GRAY,
    TikZColor.ALMOST_BLACK,
    TikZColor.BLACK,
    TikZColor.RED,
    TikZColor.ORANGE,
    TikZColor.YELLOW,
    TikZColor.GREEN,
    TikZColor.LIGHT_BLUE,
    TikZColor.DARK_BLUE,
    TikZColor.PURPLE,
    TikZColor.MAGENTA,
    TikZColor.PINK,
    TikZColor.ROSE,
  ];
}
