import type { ValidatorId } from '@bftsim/consensus';

export interface TopologyNode {
  id: ValidatorId;
  faulty: boolean;
}

export interface Topology {
  nodes: TopologyNode[];
  /** Undirected edges, each pair listed once in rotation order. */
  edges: [ValidatorId, ValidatorId][];
}

/**
 * Display graph for presentation: a ring through every validator plus
 * cross edges to the validator half-way round. Carries no protocol meaning.
 */
export function buildTopology(validators: readonly ValidatorId[], faultyLeader: ValidatorId | null): Topology {
  const nodes = validators.map((id) => ({ id, faulty: id === faultyLeader }));
  const edges: [ValidatorId, ValidatorId][] = [];
  const seen = new Set<string>();

  const link = (i: number, j: number): void => {
    const a = validators[i];
    const b = validators[j];
    if (a === undefined || b === undefined || a === b) return;
    const key = i < j ? `${i}-${j}` : `${j}-${i}`;
    if (seen.has(key)) return;
    seen.add(key);
    edges.push([a, b]);
  };

  const n = validators.length;
  for (let i = 0; i < n; i++) {
    link(i, (i + 1) % n);
  }
  const half = Math.floor(n / 2);
  for (let i = 0; i < half; i++) {
    link(i, (i + half) % n);
  }

  return { nodes, edges };
}
