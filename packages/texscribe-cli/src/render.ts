/**
 * Renders a validated document description through the document model
 *
 * Blocks map onto environments one to one. TikZ items are written into their
 * picture in order; a path refers to nodes by the names of earlier node items
 * of the same picture (or of an enclosing picture, for items in a scope).
 */

import {
  Center,
  Figure,
  LaTeXDocument,
  LaTeXEnvironment,
  MathsEnvironment,
  TeXValueError,
  vspace,
  type CompileOptions,
  type ParentScope,
} from 'texscribe-core';
import {
  Point,
  PolarPoint,
  TikZCircle,
  TikZColor,
  TikZDirectedPath,
  TikZLabel,
  TikZNode,
  TikZPath,
  TikZPicture,
  TikZScope,
  TikZStyle,
  parseArrow,
  type PathCoordinate,
  type StyleValue,
} from 'texscribe-tikz';
import type {
  Block,
  ColorDescription,
  DocumentDescription,
  PointDescription,
  StyleDescription,
  TikZItem,
  TikZPathItem,
} from './schema.js';

export interface RenderOptions {
  /** Replace an existing `.tex` file */
  overwrite?: boolean;
  /** Compile right after the source has been written */
  compile?: CompileOptions;
}

/**
 * Colors a description can refer to: the default colors, then its own
 */
export class ColorTable {
  private readonly colors = new Map<string, TikZColor>();

  constructor(declared: readonly ColorDescription[] = []) {
    for (const color of TikZColor.DEFAULT_COLORS) {
      this.colors.set(color.name, color);
    }
    for (const { name, value, mode } of declared) {
      this.colors.set(name, new TikZColor(name, value, mode ?? 'rgb'));
    }
  }

  get(name: string): TikZColor {
    const color = this.colors.get(name);
    if (color === undefined) {
      throw new TeXValueError(`Unknown color '${name}'`);
    }
    return color;
  }
}

export function toPoint(description: PointDescription): Point {
  if (Array.isArray(description)) {
    return new Point(description[0], description[1]);
  }
  if ('angle' in description) {
    return new PolarPoint(description.angle, description.radius, { unit: description.unit });
  }
  return new Point(description.x, description.y, { unit: description.unit, relative: description.relative });
}

export function toStyle(description: StyleDescription | undefined, colors: ColorTable): TikZStyle {
  const entries: Record<string, StyleValue> = {};
  for (const [key, value] of Object.entries(description ?? {})) {
    entries[key] = typeof value === 'object' ? colors.get(value.color) : value;
  }
  return new TikZStyle({}, entries);
}

class DescriptionRenderer {
  constructor(private readonly colors: ColorTable) {}

  renderBlocks(scope: ParentScope, blocks: readonly Block[]): void {
    for (const block of blocks) {
      this.renderBlock(scope, block);
    }
  }

  private renderBlock(scope: ParentScope, block: Block): void {
    switch (block.type) {
      case 'text':
        scope.contentHandler.write(block.text);
        break;
      case 'line':
        scope.contentHandler.writeLine(block.text ?? '');
        break;
      case 'newline':
        scope.contentHandler.newline(block.count ?? 1);
        break;
      case 'pageBreak':
        scope.contentHandler.writeLine('\\newpage');
        scope.contentHandler.newline();
        break;
      case 'vspace':
        scope.contentHandler.writeLine(vspace(block.length));
        break;
      case 'maths': {
        const { rows } = block;
        new MathsEnvironment(scope, block.environment ?? 'align', { star: block.star }).use((maths) => {
          rows.forEach((row, index) => {
            if (index > 0) maths.newline();
            maths.write(row);
          });
        });
        break;
      }
      case 'tikz': {
        const picture = new TikZPicture(scope, {
          style: toStyle(block.style, this.colors),
          onDuplicateName: block.onDuplicateName,
        });
        const { items } = block;
        picture.use((tikz) => this.renderItems(tikz, items, new Map()));
        break;
      }
      case 'environment': {
        const { blocks } = block;
        new LaTeXEnvironment(scope, block.name, {
          options: block.options,
          requiredPackages: block.packages,
        }).use((environment) => this.renderBlocks(environment, blocks));
        break;
      }
      case 'center': {
        const { blocks } = block;
        new Center(scope).use((center) => this.renderBlocks(center, blocks));
        break;
      }
      case 'figure': {
        const { blocks } = block;
        new Figure(scope, { caption: block.caption, label: block.label, options: block.placement }).use((figure) =>
          this.renderBlocks(figure, blocks)
        );
        break;
      }
    }
  }

  private renderItems(picture: TikZPicture, items: readonly TikZItem[], nodes: Map<string, TikZNode>): void {
    for (const item of items) {
      switch (item.type) {
        case 'node': {
          const node = new TikZNode({
            coordinate: item.at === undefined ? undefined : toPoint(item.at),
            name: item.name,
            label: item.label,
            relativeTo: item.relativeTo === undefined ? undefined : this.node(nodes, item.relativeTo),
            style: toStyle(item.style, this.colors),
          });
          const drawn = picture.drawNamed(node);
          if (node.name !== '') {
            // later references go to the node as drawn, which may have been renamed
            nodes.set(node.name, drawn instanceof TikZNode ? drawn : node);
          }
          break;
        }
        case 'path':
          picture.write(this.path(item, nodes));
          break;
        case 'circle':
          picture.write(new TikZCircle(toPoint(item.at), item.radius, toStyle(item.style, this.colors)));
          break;
        case 'raw':
          picture.writeLine(item.text);
          break;
        case 'scope': {
          const scopeItems = item.items;
          new TikZScope(picture, { style: toStyle(item.style, this.colors) }).use((scope) =>
            this.renderItems(scope, scopeItems, new Map(nodes))
          );
          break;
        }
      }
    }
  }

  private path(item: TikZPathItem, nodes: ReadonlyMap<string, TikZNode>): TikZPath {
    const coordinates: PathCoordinate[] = item.through.map((entry) =>
      typeof entry === 'string' ? this.node(nodes, entry) : toPoint(entry)
    );
    const options = {
      cycle: item.cycle,
      label: item.label === undefined ? undefined : new TikZLabel(item.label.text, toStyle(item.label.style, this.colors)),
      style: toStyle(item.style, this.colors),
    };
    if (item.arrow === undefined) {
      return new TikZPath(coordinates, options);
    }
    const arrowType = parseArrow(item.arrow);
    if (arrowType === undefined) {
      throw new TeXValueError(`Unknown arrow head '${item.arrow}'`);
    }
    return new TikZDirectedPath(coordinates, { ...options, arrowType });
  }

  private node(nodes: ReadonlyMap<string, TikZNode>, name: string): TikZNode {
    const node = nodes.get(name);
    if (node === undefined) {
      throw new TeXValueError(`Unknown node '${name}', nodes must be declared before they are referenced`);
    }
    return node;
  }
}

/**
 * Write `description` to `outputPath` (and compile it when asked to)
 *
 * @returns the closed document
 */
export function renderDocument(
  description: DocumentDescription,
  outputPath: string,
  options: RenderOptions = {}
): LaTeXDocument {
  const colors = new ColorTable(description.colors);
  const document = new LaTeXDocument(outputPath, {
    documentClass: description.documentClass,
    documentOptions: description.documentOptions,
    defaultPackages: description.defaultPackages,
    title: description.title,
    subtitle: description.subtitle,
    author: description.author,
    showDate: description.showDate,
    showPageNumbers: description.showPageNumbers,
    lineWrapLength: description.lineWrapLength,
    overwrite: options.overwrite,
    compile: options.compile,
  });

  document.use((doc) => {
    for (const entry of description.packages ?? []) {
      if (typeof entry === 'string') {
        doc.usePackage(entry);
      } else {
        doc.usePackage(entry.name, entry.options);
      }
    }
    if (description.tikzLibraries !== undefined && description.tikzLibraries.length > 0) {
      doc.useTikzLibrary(...description.tikzLibraries);
    }
    new DescriptionRenderer(colors).renderBlocks(doc, description.blocks);
  });
  return document;
}
