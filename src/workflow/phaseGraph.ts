export const TERMINATE = 'TERMINATE';

export type Target<N extends string> = N | typeof TERMINATE;

export type PhaseHandler<S> = (state: S) => Promise<S>;

export type Transition<N extends string, S> =
  | { kind: 'direct'; to: Target<N> }
  | { kind: 'conditional'; choose: (state: S) => string; routes: Record<string, Target<N>> };

export interface PhaseGraph<N extends string, S> {
  entry: N;
  // Declaration order; also the order a full run visits them.
  phases: readonly N[];
  nodes: Record<N, PhaseHandler<S>>;
  edges: Record<N, Transition<N, S>>;
}

export const direct = <N extends string, S>(to: Target<N>): Transition<N, S> => ({ kind: 'direct', to });

export const conditional = <N extends string, S>(
  choose: (state: S) => string,
  routes: Record<string, Target<N>>
): Transition<N, S> => ({ kind: 'conditional', choose, routes });

export const resolveNext = <N extends string, S>(graph: PhaseGraph<N, S>, from: N, state: S): Target<N> => {
  const edge = graph.edges[from];
  if (edge.kind === 'direct') return edge.to;
  const label = edge.choose(state);
  const target = edge.routes[label];
  if (target === undefined) {
    throw new Error(`no route '${label}' out of ${from}`);
  }
  return target;
};

// Every route must land on a known node or TERMINATE.
export const validateGraph = <N extends string, S>(graph: PhaseGraph<N, S>): string[] => {
  const known = new Set<string>(graph.phases);
  const problems: string[] = [];
  if (!known.has(graph.entry)) problems.push(`entry ${graph.entry} is not a node`);
  for (const from of graph.phases) {
    const edge = graph.edges[from];
    const targets = edge.kind === 'direct' ? [edge.to] : Object.values(edge.routes);
    for (const to of targets) {
      if (to !== TERMINATE && !known.has(to)) problems.push(`${from} routes to unknown node ${to}`);
    }
  }
  return problems;
};
