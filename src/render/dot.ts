import type { GraphVisitor } from "../graph/types.js";

interface DotSyntax {
  readonly keyword: "digraph" | "graph";
  readonly arrow: "->" | "--";
  /** Undirected graphs print each mirrored pair once. */
  readonly keepArc: (src: number, dst: number) => boolean;
}

const DIRECTED: DotSyntax = { keyword: "digraph", arrow: "->", keepArc: () => true };
const UNDIRECTED: DotSyntax = { keyword: "graph", arrow: "--", keepArc: (src, dst) => src <= dst };

/**
 * Renders a graph as Graphviz DOT source. Nodes are named `n<index>` and both
 * nodes and arcs carry their weight as label. Statements follow visitation
 * order: every node first, then every kept arc.
 */
export function toDotSource<N>(graph: GraphVisitor<N>): string {
  const syntax = graph.type === "direct" ? DIRECTED : UNDIRECTED;
  const statements: string[] = [];
  graph.visitNodes((index, weight) => {
    statements.push(`\tn${index} [label="${escapeLabel(graph.algebra.format(weight))}"];`);
  });
  graph.visitArcs((src, dst, weight) => {
    if (syntax.keepArc(src, dst)) {
      statements.push(`\tn${src} ${syntax.arrow} n${dst} [label="${escapeLabel(graph.algebra.format(weight))}"];`);
    }
  });
  return `${syntax.keyword} {\n${statements.join("\n")}\n}`;
}

function escapeLabel(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}
