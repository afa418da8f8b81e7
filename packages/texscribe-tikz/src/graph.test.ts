import { describe, it, expect } from 'vitest';
import { TikZArrow } from './arrow.js';
import { TikZColor } from './color.js';
import { TikZGraph } from './graph.js';
import { TikZDirectedPath, TikZNode, TikZPath } from './objects.js';
import { Point } from './point.js';
import { TikZStyle } from './style.js';

describe('TikZGraph', () => {
  const a = new TikZNode({ coordinate: new Point(0, 0), name: 'a' });
  const b = new TikZNode({ coordinate: new Point(1, 0), name: 'b', style: new TikZStyle({ rectangle: true }) });

  function buildGraph(): TikZGraph {
    const graph = new TikZGraph(new TikZStyle({ circle: true }), new TikZStyle({ lineWidth: '0.25mm' }));
    graph.addNode(a, [b]);
    graph.addEdge(new TikZDirectedPath([a, b], { arrowType: TikZArrow.RIGHT }));
    graph.addEdge([new TikZPath([b, a], { style: new TikZStyle({ dashed: true }) })]);
    return graph;
  }

  it('should give unstyled nodes and edges the default styles', () => {
    const graph = buildGraph();
    expect(graph.nodes.map((node) => node.style.toString())).toEqual(['circle', 'rectangle']);
    expect(graph.nodes[1]).toBe(b);
    expect(graph.edges.map((edge) => edge.toTikZ())).toEqual([
      '\\draw[->, line width={0.25mm}] (a) to (b);',
      '\\draw[dashed] (b) -- (a);',
    ]);
  });

  it('should write every edge on its own line', () => {
    expect(buildGraph().toTikZ()).toBe('\\draw[->, line width={0.25mm}] (a) to (b);\n\\draw[dashed] (b) -- (a);');
  });

  it('should need positioning and the libraries of its edges', () => {
    expect(buildGraph().requiredTikzLibraries).toEqual(['positioning', 'arrows']);
    expect(new TikZGraph().requiredTikzLibraries).toEqual(['positioning']);
  });

  it('should need its own nodes rather than the ones on its edges', () => {
    const graph = buildGraph();
    const required = graph.requiredNamedObjects;
    expect(required.map((object) => object.name)).toEqual(['a', 'b']);
    expect(required[0].definition).toBe('\\node[circle] (a) at ( 0.000,  0.000) {};');
  });

  it('should need the colors of its default styles first', () => {
    const graph = new TikZGraph(new TikZStyle({ fill: TikZColor.YELLOW }));
    graph.addNode(new TikZNode({ name: 'n' }));
    expect(graph.requiredNamedObjects.map((object) => object.name)).toEqual(['YELLOW', 'n']);
  });
});
