/**
 * TikZ drawing primitives: nodes, labels, paths and circles
 */

import { TeXValueError } from 'texscribe-core';
import { TikZArrow } from './arrow.js';
import { uniqueNamed, type NamedResolver, type TikZDefinesNamed, type TikZNamed, type TikZValue } from './base.js';
import { Point } from './point.js';
import { TikZStyle } from './style.js';

/**
 * Something that carries a style
 */
export interface TikZStyled {
  readonly style: TikZStyle;
}

export interface TikZNodeOptions {
  coordinate?: Point;
  /** Name used to reference the node from paths */
  name?: string;
  /** Text set inside the node */
  label?: string;
  /** Place `coordinate` relative to this node */
  relativeTo?: TikZNode;
  style?: TikZStyle;
}

/**
 * A TikZ node. Nodes are equal when their names are equal.
 *
 * ```ts
 * new TikZNode({ coordinate: new Point(0, 0), name: 'o', label: 'origin' }).definition;
 * // '\node[] (o) at ( 0.000,  0.000) {origin};'
 * ```
 */
export class TikZNode implements TikZNamed, TikZDefinesNamed, TikZStyled {
  readonly coordinate: Point;
  readonly name: string;
  readonly label: string;
  readonly style: TikZStyle;
  readonly requiredPackages: readonly string[] = [];
  readonly requiredTikzLibraries: readonly string[] = [];

  constructor(options: TikZNodeOptions = {}) {
    let coordinate = options.coordinate ?? new Point(0, 0);
    if (coordinate.relative) {
      throw new TeXValueError(`The coordinate ${coordinate.toTikZ()} of a node cannot be relative`);
    }
    if (options.relativeTo !== undefined) {
      const anchor = options.relativeTo.coordinate;
      if (anchor.unit !== coordinate.unit) {
        throw new TeXValueError(
          `Unit of the anchor node (${anchor.unit || 'none'}) does not match the coordinate (${coordinate.unit || 'none'})`
        );
      }
      coordinate = anchor.add(coordinate);
    }
    this.coordinate = coordinate;
    this.name = (options.name ?? '').trim();
    this.label = options.label ?? '';
    this.style = options.style ?? new TikZStyle();
  }

  get requiredNamedObjects(): readonly TikZNamed[] {
    return this.style.colors;
  }

  /**
   * The `\node` command that draws this node
   */
  get definition(): string {
    const name = this.name === '' ? '' : ` (${this.name})`;
    return `\\node[${this.style}]${name} at ${this.coordinate.toTikZ()} {${this.label}};`;
  }

  /**
   * Copy of this node with another style; the coordinate is kept as resolved
   */
  withStyle(style: TikZStyle): TikZNode {
    return new TikZNode({ coordinate: this.coordinate, name: this.name, label: this.label, style });
  }

  renamed(name: string): TikZNode {
    return new TikZNode({ coordinate: this.coordinate, name, label: this.label, style: this.style });
  }

  withNamedObjects(resolve: NamedResolver): TikZNode {
    const style = this.style.withColors(resolve);
    return style === this.style ? this : this.withStyle(style);
  }

  equals(other: unknown): boolean {
    return other instanceof TikZNode && other.name === this.name;
  }

  toTikZ(): string {
    return this.definition;
  }

  toString(): string {
    return this.definition;
  }
}

/**
 * Text attached to a path, written as `node[style] {label}`
 */
export class TikZLabel implements TikZDefinesNamed, TikZStyled {
  readonly requiredPackages: readonly string[] = [];
  readonly requiredTikzLibraries: readonly string[] = [];

  constructor(
    readonly label: string = '',
    readonly style: TikZStyle = new TikZStyle()
  ) {}

  get requiredNamedObjects(): readonly TikZNamed[] {
    return this.style.colors;
  }

  withNamedObjects(resolve: NamedResolver): TikZLabel {
    const style = this.style.withColors(resolve);
    return style === this.style ? this : new TikZLabel(this.label, style);
  }

  toTikZ(): string {
    return `node[${this.style}] {${this.label}}`;
  }

  toString(): string {
    return this.toTikZ();
  }
}

export type PathCoordinate = Point | TikZNode;

export interface TikZPathOptions {
  /** Close the path back to its first coordinate */
  cycle?: boolean;
  label?: TikZLabel;
  style?: TikZStyle;
}

/**
 * A `\draw` path through points and nodes, joined by `--`
 */
export class TikZPath implements TikZDefinesNamed, TikZStyled {
  readonly coordinates: readonly PathCoordinate[];
  readonly cycle: boolean;
  readonly label: TikZLabel | undefined;
  readonly style: TikZStyle;
  readonly requiredPackages: readonly string[] = [];

  constructor(coordinates: readonly PathCoordinate[], options: TikZPathOptions = {}) {
    for (const coordinate of coordinates) {
      if (coordinate instanceof TikZNode && coordinate.name === '') {
        throw new TeXValueError('Nodes on a path need a name to be referenced');
      }
    }
    this.coordinates = [...coordinates];
    this.cycle = options.cycle ?? false;
    this.label = options.label;
    this.style = options.style ?? new TikZStyle();
  }

  get requiredTikzLibraries(): readonly string[] {
    return [];
  }

  get arrowType(): TikZArrow {
    return TikZArrow.LINE;
  }

  /**
   * Nodes on the path, then the colors of the path and label styles
   */
  get requiredNamedObjects(): readonly TikZNamed[] {
    const nodes = this.coordinates.filter((coordinate): coordinate is TikZNode => coordinate instanceof TikZNode);
    return uniqueNamed([...nodes, ...this.style.colors, ...(this.label?.style.colors ?? [])]);
  }

  get coordinatesString(): string {
    return this.coordinates
      .map((coordinate) => (coordinate instanceof TikZNode ? `(${coordinate.name})` : coordinate.toTikZ()))
      .join(this.joiner);
  }

  /**
   * Copy of this path with another style
   */
  withStyle(style: TikZStyle): TikZPath {
    return this.copy(this.coordinates, { cycle: this.cycle, label: this.label, style });
  }

  /**
   * Copy of this path through the resolved nodes, with resolved colors
   */
  withNamedObjects(resolve: NamedResolver): TikZPath {
    const coordinates = this.coordinates.map((coordinate) => {
      if (!(coordinate instanceof TikZNode)) return coordinate;
      const resolved = resolve(coordinate);
      return resolved instanceof TikZNode ? resolved : coordinate;
    });
    return this.copy(coordinates, {
      cycle: this.cycle,
      label: this.label?.withNamedObjects(resolve),
      style: this.style.withColors(resolve),
    });
  }

  toTikZ(): string {
    return `\\draw[${this.styleList()}] ${this.coordinatesString}${this.tail()};`;
  }

  toString(): string {
    return this.toTikZ();
  }

  protected get joiner(): string {
    return ' -- ';
  }

  protected copy(coordinates: readonly PathCoordinate[], options: TikZPathOptions): TikZPath {
    return new TikZPath(coordinates, options);
  }

  protected styleList(): string {
    return this.style.toString();
  }

  private tail(): string {
    const cycle = this.cycle ? `${this.joiner}cycle` : '';
    const label = this.label === undefined ? '' : ` node[${this.label.style}] {${this.label.label}}`;
    return cycle + label;
  }
}

export interface TikZDirectedPathOptions extends TikZPathOptions {
  arrowType?: TikZArrow;
}

/**
 * A path joined by `to`, with an arrow head option
 *
 * ```ts
 * new TikZDirectedPath([a, b], { arrowType: TikZArrow.RIGHT }).toTikZ();
 * // '\draw[->] (a) to (b);'
 * ```
 */
export class TikZDirectedPath extends TikZPath {
  private readonly arrow: TikZArrow;

  constructor(coordinates: readonly PathCoordinate[], options: TikZDirectedPathOptions = {}) {
    super(coordinates, options);
    this.arrow = options.arrowType ?? TikZArrow.LINE;
  }

  override get requiredTikzLibraries(): readonly string[] {
    return ['arrows'];
  }

  override get arrowType(): TikZArrow {
    return this.arrow;
  }

  protected override get joiner(): string {
    return ' to ';
  }

  protected override copy(coordinates: readonly PathCoordinate[], options: TikZPathOptions): TikZDirectedPath {
    return new TikZDirectedPath(coordinates, { ...options, arrowType: this.arrow });
  }

  protected override styleList(): string {
    return [this.arrow, this.style.toString()].filter((part) => part !== '').join(', ');
  }
}

/**
 * A circle around `coordinate`, written as `\draw[style] coordinate circle (radius);`
 */
export class TikZCircle implements TikZDefinesNamed, TikZStyled {
  readonly requiredPackages: readonly string[] = [];
  readonly requiredTikzLibraries: readonly string[] = [];

  constructor(
    readonly coordinate: Point,
    readonly radius: TikZValue,
    readonly style: TikZStyle = new TikZStyle()
  ) {
    if (typeof radius === 'number' && !(Number.isFinite(radius) && radius >= 0)) {
      throw new TeXValueError(`The radius of a circle must be a non-negative number, received ${radius}`);
    }
  }

  get requiredNamedObjects(): readonly TikZNamed[] {
    return this.style.colors;
  }

  withNamedObjects(resolve: NamedResolver): TikZCircle {
    const style = this.style.withColors(resolve);
    return style === this.style ? this : new TikZCircle(this.coordinate, this.radius, style);
  }

  toTikZ(): string {
    return `\\draw[${this.style}] ${this.coordinate.toTikZ()} circle (${this.radius});`;
  }

  toString(): string {
    return this.toTikZ();
  }
}
