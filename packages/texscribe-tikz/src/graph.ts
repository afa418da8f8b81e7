/**
 * TikZGraph - nodes and edges written as one unit
 *
 * Nodes and edges without a style of their own take the graph's default
 * styles. Writing the graph into a picture defines its nodes (and their
 * colors) first, then draws every edge on its own line. No layout or graph
 * algorithms are involved: nodes are placed where their coordinates say.
 */

import { uniqueNamed, type NamedResolver, type TikZDefinesNamed, type TikZNamed } from './base.js';
import { TikZNode, type TikZPath } from './objects.js';
import { TikZStyle } from './style.js';

export class TikZGraph implements TikZDefinesNamed {
  readonly requiredPackages: readonly string[] = [];
  private readonly nodeList: TikZNode[] = [];
  private readonly edgeList: TikZPath[] = [];

  constructor(
    readonly nodeStyle: TikZStyle = new TikZStyle(),
    readonly edgeStyle: TikZStyle = new TikZStyle()
  ) {}

  get nodes(): readonly TikZNode[] {
    return [...this.nodeList];
  }

  get edges(): readonly TikZPath[] {
    return [...this.edgeList];
  }

  /**
   * `positioning`, plus whatever the edges need
   */
  get requiredTikzLibraries(): readonly string[] {
    const libraries = ['positioning'];
    for (const edge of this.edgeList) {
      for (const library of edge.requiredTikzLibraries) {
        if (!libraries.includes(library)) {
          libraries.push(library);
        }
      }
    }
    return libraries;
  }

  /**
   * Default style colors, the nodes, then what the edges need. Nodes of an
   * edge are taken from the graph where it has a node of that name.
   */
  get requiredNamedObjects(): readonly TikZNamed[] {
    const names = new Set(this.nodeList.map((node) => node.name));
    const fromEdges = this.edgeList
      .flatMap((edge) => edge.requiredNamedObjects)
      .filter((object) => !(object instanceof TikZNode && names.has(object.name)));
    return uniqueNamed([...this.nodeStyle.colors, ...this.edgeStyle.colors, ...this.nodeList, ...fromEdges]);
  }

  addNode(...nodes: Array<TikZNode | readonly TikZNode[]>): void {
    for (const node of nodes.flat()) {
      this.nodeList.push(node.style.isEmpty ? node.withStyle(this.nodeStyle) : node);
    }
  }

  addEdge(...edges: Array<TikZPath | readonly TikZPath[]>): void {
    for (const edge of edges.flat()) {
      this.edgeList.push(edge.style.isEmpty ? edge.withStyle(this.edgeStyle) : edge);
    }
  }

  /**
   * Copy of this graph with its nodes, edges and default styles resolved
   */
  withNamedObjects(resolve: NamedResolver): TikZGraph {
    const graph = new TikZGraph(this.nodeStyle.withColors(resolve), this.edgeStyle.withColors(resolve));
    for (const node of this.nodeList) {
      const resolved = resolve(node);
      graph.nodeList.push(resolved !== node && resolved instanceof TikZNode ? resolved : node.withNamedObjects(resolve));
    }
    for (const edge of this.edgeList) {
      graph.edgeList.push(edge.withNamedObjects(resolve));
    }
    return graph;
  }

  /**
   * The edges, one `\draw` command per line
   */
  toTikZ(): string {
    return this.edgeList.map((edge) => edge.toTikZ()).join('\n');
  }

  toString(): string {
    return this.toTikZ();
  }
}
