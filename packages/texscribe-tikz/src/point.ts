/**
 * Coordinates
 *
 * A point is written with three decimals and a leading space for non-negative
 * values, followed by its unit: `Point(3, 4, { unit: 'CM' })` is written as
 * `( 3.000cm,  4.000cm)`. Relative points get a `+` prefix. Arithmetic is only
 * defined between points of the same unit.
 */

import { TeXValueError } from 'texscribe-core';
import type { TikZWriteable } from './base.js';

export interface PointOptions {
  /** Unit suffix, converted to lower case */
  unit?: string;
  /** Relative to the previous coordinate of a path */
  relative?: boolean;
}

type PointOperand = number | Point | readonly [number, number];

function formatNumber(value: number): string {
  return `${value < 0 ? '' : ' '}${value.toFixed(3)}`;
}

function requireFinite(value: number, what: string): void {
  if (!Number.isFinite(value)) {
    throw new TeXValueError(`${what} of a point must be a finite number, received ${value}`);
  }
}

export class Point implements TikZWriteable {
  readonly x: number;
  readonly y: number;
  readonly unit: string;
  readonly relative: boolean;
  readonly requiredPackages: readonly string[] = [];
  readonly requiredTikzLibraries: readonly string[] = [];

  constructor(x: number, y: number, options: PointOptions = {}) {
    requireFinite(x, 'x');
    requireFinite(y, 'y');
    this.x = x;
    this.y = y;
    this.unit = (options.unit ?? '').toLowerCase();
    this.relative = options.relative ?? false;
  }

  /**
   * Angle in degrees, counter-clockwise from the positive x axis
   */
  get angle(): number {
    return (Math.atan2(this.y, this.x) * 180) / Math.PI;
  }

  get radius(): number {
    return this.length();
  }

  length(): number {
    return Math.hypot(this.x, this.y);
  }

  dot(other: Point): number {
    this.requireSameUnit(other);
    return this.x * other.x + this.y * other.y;
  }

  add(other: PointOperand): Point {
    return this.combine(other, (a, b) => a + b);
  }

  subtract(other: PointOperand): Point {
    return this.combine(other, (a, b) => a - b);
  }

  multiply(other: PointOperand): Point {
    return this.combine(other, (a, b) => a * b);
  }

  divide(other: PointOperand): Point {
    const [dx, dy] = this.operands(other);
    if (dx === 0 || dy === 0) {
      throw new TeXValueError(`Cannot divide ${this.toTikZ()} by (${dx}, ${dy})`);
    }
    return this.combine(other, (a, b) => a / b);
  }

  negate(): Point {
    return new Point(-this.x, -this.y, { unit: this.unit, relative: this.relative });
  }

  abs(): Point {
    return new Point(Math.abs(this.x), Math.abs(this.y), { unit: this.unit, relative: this.relative });
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Point &&
      other.x === this.x &&
      other.y === this.y &&
      other.unit === this.unit &&
      other.relative === this.relative
    );
  }

  toTikZ(): string {
    return `${this.relative ? '+' : ''}(${formatNumber(this.x)}${this.unit}, ${formatNumber(this.y)}${this.unit})`;
  }

  toString(): string {
    return this.toTikZ();
  }

  protected requireSameUnit(other: Point): void {
    if (other.unit !== this.unit) {
      throw new TeXValueError(
        `Cannot combine points of different units, given '${this.unit}' and '${other.unit}'`
      );
    }
  }

  private operands(other: PointOperand): [number, number] {
    if (other instanceof Point) {
      this.requireSameUnit(other);
      return [other.x, other.y];
    }
    if (typeof other === 'number') {
      return [other, other];
    }
    return [other[0], other[1]];
  }

  private combine(other: PointOperand, operator: (a: number, b: number) => number): Point {
    const [ox, oy] = this.operands(other);
    return new Point(operator(this.x, ox), operator(this.y, oy), {
      unit: this.unit,
      relative: this.relative && (!(other instanceof Point) || other.relative),
    });
  }
}

/**
 * A point given by angle (in degrees) and radius, written as
 * `( angle: radius unit)`
 */
export class PolarPoint extends Point {
  private readonly polarAngle: number;
  private readonly polarRadius: number;

  constructor(angle: number, radius: number, options: PointOptions = {}) {
    requireFinite(angle, 'angle');
    requireFinite(radius, 'radius');
    const normalized = ((angle % 360) + 360) % 360;
    const radians = (normalized * Math.PI) / 180;
    super(Math.cos(radians) * radius, Math.sin(radians) * radius, options);
    this.polarAngle = normalized;
    this.polarRadius = radius;
  }

  override get angle(): number {
    return this.polarAngle;
  }

  override get radius(): number {
    return this.polarRadius;
  }

  override toTikZ(): string {
    return `${this.relative ? '+' : ''}(${formatNumber(this.polarAngle)}:${formatNumber(this.polarRadius)}${this.unit})`;
  }
}

/**
 * A point relative to the previous coordinate of a path
 */
export function relativePoint(x: number, y: number, unit: string = ''): Point {
  return new Point(x, y, { unit, relative: true });
}
