import { describe, expect, it } from 'vitest';
import { plainEdge, plainNode } from '../testing/fixtures';
import type { RoutingEdgeRecord } from '../types/nodes';
import { buildRoutingGraph, type RoutingGraph } from './graphAssembler';
import { solveShortestPath } from './pathSolver';

// Small deterministic generator so the random graphs are the same every run
function lcg(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function bruteForceShortest(graph: RoutingGraph, source: string, target: string): number | null {
  let best: number | null = null;
  const visited = new Set<string>([source]);
  const walk = (vertex: string, total: number) => {
    if (vertex === target) {
      if (best === null || total < best) best = total;
      return;
    }
    for (const { vertexId, edge } of graph.neighbors(vertex)) {
      if (visited.has(vertexId)) continue;
      visited.add(vertexId);
      walk(vertexId, total + edge.weight);
      visited.delete(vertexId);
    }
  };
  walk(source, 0);
  return best;
}

function randomGraph(seed: number, size: number, backbone = false): RoutingGraph {
  const random = lcg(seed);
  const nodes = Array.from({ length: size }, (_, i) => plainNode(`v${i}`));
  const edges: RoutingEdgeRecord[] = [];
  for (let i = 0; i < size; i++) {
    for (let j = i + 1; j < size; j++) {
      if (random() < 0.35) {
        edges.push(plainEdge(`e${i}-${j}`, `v${i}`, `v${j}`, 1 + Math.floor(random() * 20)));
      }
    }
  }
  if (backbone) {
    for (let i = 0; i + 1 < size; i++) {
      edges.push(plainEdge(`chain-${i}`, `v${i}`, `v${i + 1}`, 50));
    }
  }
  return buildRoutingGraph(nodes, edges, { accessibleOnly: false });
}

describe('solveShortestPath', () => {
  it('matches exhaustive search on small random graphs', () => {
    for (let seed = 1; seed <= 25; seed++) {
      const graph = randomGraph(seed, 7);
      const solved = solveShortestPath(graph, 'v0', 'v6');
      const expected = bruteForceShortest(graph, 'v0', 'v6');
      if (expected === null) {
        expect(solved).toBeNull();
      } else {
        expect(solved?.distance).toBe(expected);
      }
    }
  });

  it('reports the sum of the traversed edges and a connected path', () => {
    const graph = randomGraph(7, 8, true);
    const solved = solveShortestPath(graph, 'v0', 'v7');
    expect(solved).not.toBeNull();
    if (!solved) return;

    expect(solved.path[0]).toBe('v0');
    expect(solved.path[solved.path.length - 1]).toBe('v7');
    expect(solved.edges).toHaveLength(solved.path.length - 1);
    expect(solved.distance).toBe(solved.edges.reduce((sum, e) => sum + e.weight, 0));
    solved.edges.forEach((edge, i) => {
      expect([edge.from, edge.to].sort()).toEqual([solved.path[i], solved.path[i + 1]].sort());
    });
  });

  it('returns a single-vertex path for source equal to target', () => {
    const graph = buildRoutingGraph([plainNode('a')], [], { accessibleOnly: false });
    expect(solveShortestPath(graph, 'a', 'a')).toEqual({ path: ['a'], edges: [], distance: 0 });
  });

  it('returns null across disconnected components', () => {
    const graph = buildRoutingGraph(
      [plainNode('a'), plainNode('b'), plainNode('c'), plainNode('d')],
      [plainEdge('ab', 'a', 'b', 1), plainEdge('cd', 'c', 'd', 1)],
      { accessibleOnly: false },
    );
    expect(solveShortestPath(graph, 'a', 'd')).toBeNull();
  });

  it('picks the same path among equal-cost alternatives every time', () => {
    const nodes = ['s', 'x', 'y', 't'].map((n) => plainNode(n));
    const edges = [
      plainEdge('sy', 's', 'y', 1),
      plainEdge('sx', 's', 'x', 1),
      plainEdge('yt', 'y', 't', 1),
      plainEdge('xt', 'x', 't', 1),
    ];
    const graph = buildRoutingGraph(nodes, edges, { accessibleOnly: false });
    const reversed = buildRoutingGraph(nodes, [...edges].reverse(), { accessibleOnly: false });

    expect(solveShortestPath(graph, 's', 't')?.path).toEqual(['s', 'x', 't']);
    expect(solveShortestPath(reversed, 's', 't')?.path).toEqual(['s', 'x', 't']);
  });

  it('throws for a vertex outside the graph', () => {
    const graph = buildRoutingGraph([plainNode('a')], [], { accessibleOnly: false });
    expect(() => solveShortestPath(graph, 'a', 'nope')).toThrow(RangeError);
  });
});
