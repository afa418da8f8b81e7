import { describe, it, expect } from 'vitest';
import { TeXValueError } from 'texscribe-core';
import { TIKZ_ARROWS, TikZArrow, parseArrow } from './arrow.js';
import { TikZColor } from './color.js';
import { TikZCircle, TikZDirectedPath, TikZLabel, TikZNode, TikZPath } from './objects.js';
import { Point, relativePoint } from './point.js';
import { TikZStyle } from './style.js';

describe('TikZArrow', () => {
  it('should list every arrow head', () => {
    expect(TIKZ_ARROWS).toHaveLength(19);
    expect(TikZArrow.LEFT_RIGHT_LATEX_PRIME).toBe("latex'-latex'");
  });

  it('should parse names and options', () => {
    expect(parseArrow('RIGHT')).toBe(TikZArrow.RIGHT);
    expect(parseArrow('-o')).toBe(TikZArrow.RIGHT_CIRC);
    expect(parseArrow('bogus')).toBeUndefined();
  });
});

describe('TikZNode', () => {
  it('should define named and unnamed nodes', () => {
    expect(new TikZNode({ coordinate: new Point(0, 0), name: 'o', label: 'origin' }).definition).toBe(
      '\\node[] (o) at ( 0.000,  0.000) {origin};'
    );
    expect(new TikZNode().definition).toBe('\\node[] at ( 0.000,  0.000) {};');
    expect(
      new TikZNode({ coordinate: new Point(1, 2), name: 'a', style: new TikZStyle({ circle: true }) }).toTikZ()
    ).toBe('\\node[circle] (a) at ( 1.000,  2.000) {};');
  });

  it('should place nodes relative to another node', () => {
    const anchor = new TikZNode({ coordinate: new Point(1, 1, { unit: 'cm' }), name: 'anchor' });
    const node = new TikZNode({ coordinate: new Point(2, 0, { unit: 'cm' }), name: 'n', relativeTo: anchor });
    expect(node.coordinate.toTikZ()).toBe('( 3.000cm,  1.000cm)');
    expect(() => new TikZNode({ coordinate: new Point(2, 0), relativeTo: anchor })).toThrow(TeXValueError);
  });

  it('should reject relative coordinates', () => {
    expect(() => new TikZNode({ coordinate: relativePoint(1, 1) })).toThrow(TeXValueError);
  });

  it('should need the colors of its style', () => {
    const node = new TikZNode({ name: 'n', style: new TikZStyle({ fill: TikZColor.GREEN }) });
    expect(node.requiredNamedObjects).toEqual([TikZColor.GREEN]);
  });

  it('should compare by name and rename into a copy', () => {
    const node = new TikZNode({ coordinate: new Point(0, 0), name: 'x0' });
    expect(node.equals(new TikZNode({ coordinate: new Point(5, 5), name: 'x0' }))).toBe(true);
    const renamed = node.renamed('x1');
    expect(renamed.definition).toBe('\\node[] (x1) at ( 0.000,  0.000) {};');
    expect(node.name).toBe('x0');
  });
});

describe('TikZPath', () => {
  const a = new TikZNode({ coordinate: new Point(0, 0), name: 'a' });
  const b = new TikZNode({ coordinate: new Point(1, 0), name: 'b' });

  it('should join coordinates with --', () => {
    expect(new TikZPath([a, new Point(1, 0)], { cycle: true }).toTikZ()).toBe(
      '\\draw[] (a) -- ( 1.000,  0.000) -- cycle;'
    );
  });

  it('should write a label after the coordinates', () => {
    const path = new TikZPath([new Point(0, 0), new Point(1, 1)], {
      label: new TikZLabel('mid', new TikZStyle({ align: 'center' })),
    });
    expect(path.toTikZ()).toBe('\\draw[] ( 0.000,  0.000) -- ( 1.000,  1.000) node[align={center}] {mid};');
  });

  it('should need its nodes, then the colors of its styles', () => {
    const path = new TikZPath([a, b, a], {
      style: new TikZStyle({ color: TikZColor.RED }),
      label: new TikZLabel('x', new TikZStyle({ fill: TikZColor.PINK })),
    });
    expect(path.requiredNamedObjects).toEqual([a, b, TikZColor.RED, TikZColor.PINK]);
    expect(path.arrowType).toBe(TikZArrow.LINE);
    expect(path.requiredTikzLibraries).toEqual([]);
  });

  it('should reject unnamed nodes', () => {
    expect(() => new TikZPath([new TikZNode(), a])).toThrow('Nodes on a path need a name to be referenced');
  });
});

describe('TikZDirectedPath', () => {
  const a = new TikZNode({ name: 'a' });
  const b = new TikZNode({ coordinate: new Point(1, 0), name: 'b' });

  it('should join with to and put the arrow first', () => {
    expect(new TikZDirectedPath([a, b], { arrowType: TikZArrow.RIGHT }).toTikZ()).toBe('\\draw[->] (a) to (b);');
    expect(
      new TikZDirectedPath([a, b], { arrowType: TikZArrow.RIGHT, style: new TikZStyle({ dashed: true }) }).toTikZ()
    ).toBe('\\draw[->, dashed] (a) to (b);');
  });

  it('should need the arrows library', () => {
    const path = new TikZDirectedPath([a, b], { arrowType: TikZArrow.LEFT_CIRC });
    expect(path.requiredTikzLibraries).toEqual(['arrows']);
    expect(path.arrowType).toBe('o-');
  });

  it('should keep the arrow when restyled', () => {
    const path = new TikZDirectedPath([a, b], { arrowType: TikZArrow.LEFT }).withStyle(new TikZStyle({ dotted: true }));
    expect(path.toTikZ()).toBe('\\draw[<-, dotted] (a) to (b);');
  });
});

describe('TikZCircle', () => {
  it('should draw around a coordinate', () => {
    const circle = new TikZCircle(new Point(0, 0, { unit: 'cm' }), '1cm', new TikZStyle({ fill: TikZColor.RED }));
    expect(circle.toTikZ()).toBe('\\draw[fill={RED!100}] ( 0.000cm,  0.000cm) circle (1cm);');
    expect(circle.requiredNamedObjects).toEqual([TikZColor.RED]);
  });

  it('should reject negative radii', () => {
    expect(() => new TikZCircle(new Point(0, 0), -1)).toThrow(TeXValueError);
  });
});

describe('TikZLabel', () => {
  it('should write a node', () => {
    expect(new TikZLabel('x').toTikZ()).toBe('node[] {x}');
  });
});
