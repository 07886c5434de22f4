import { describe, expect, it } from 'vitest';
import {
  buildingDataset,
  FLOOR_FIRST,
  FLOOR_GROUND,
  FLOOR_ROOF,
  G_ELEVATOR,
  G_STAIRS,
  F_STAIRS,
  plainEdge,
  plainNode,
} from '../testing/fixtures';
import { InvariantViolationError } from './errors';
import { assembleGraph, buildRoutingGraph, RoutingGraph } from './graphAssembler';
import { InMemoryRoutingStore } from './store/memoryStore';

describe('buildRoutingGraph', () => {
  const nodes = [plainNode('a'), plainNode('b', 'floor-a', 0, 1), plainNode('c', 'floor-b', 0, 1)];
  const edges = [
    plainEdge('e1', 'a', 'b', 4),
    plainEdge('e2', 'b', 'c', 3, false),
    plainEdge('e3', 'c', 'a', 9),
  ];

  it('treats edges as undirected', () => {
    const graph = buildRoutingGraph(nodes, edges, { accessibleOnly: false });
    expect(graph.neighbors('b').map((n) => n.vertexId)).toEqual(['a', 'c']);
    expect(graph.edgeBetween('b', 'a')?.id).toBe('e1');
  });

  it('drops inaccessible edges only when asked', () => {
    const full = buildRoutingGraph(nodes, edges, { accessibleOnly: false });
    const accessible = buildRoutingGraph(nodes, edges, { accessibleOnly: true });

    expect(full.edges().map((e) => e.id)).toEqual(['e1', 'e2', 'e3']);
    expect(accessible.edges().map((e) => e.id)).toEqual(['e1', 'e3']);
    expect(accessible.vertexCount).toBe(full.vertexCount);
    for (const edge of accessible.edges()) {
      expect(full.edges()).toContainEqual(edge);
    }
  });

  it('skips edges with an endpoint outside the node set', () => {
    const graph = buildRoutingGraph(nodes, [...edges, plainEdge('e4', 'a', 'zz', 1)], {
      accessibleOnly: false,
    });
    expect(graph.edgeCount).toBe(3);
    expect(graph.hasVertex('zz')).toBe(false);
  });

  it('refuses non-positive weights', () => {
    expect(() => buildRoutingGraph(nodes, [plainEdge('bad', 'a', 'b', 0)], { accessibleOnly: false })).toThrow(
      InvariantViolationError,
    );
  });

  it('keeps the lightest of parallel edges for edgeBetween', () => {
    const graph = buildRoutingGraph(nodes, [plainEdge('x', 'a', 'b', 5), plainEdge('y', 'b', 'a', 2)], {
      accessibleOnly: false,
    });
    expect(graph.edgeBetween('a', 'b')?.id).toBe('y');
  });

  it('lists its floors in id order', () => {
    const graph = buildRoutingGraph(nodes, [], { accessibleOnly: false });
    expect(graph.floorIds()).toEqual(['floor-a', 'floor-b']);
  });
});

describe('assembleGraph', () => {
  const store = new InMemoryRoutingStore(buildingDataset());

  it('loads nodes of the requested floors and the edges between them', async () => {
    const graph = await assembleGraph(store, [FLOOR_GROUND, FLOOR_FIRST], { accessibleOnly: false });
    expect(graph.vertexCount).toBe(7);
    // the first -> second stair edge has an endpoint outside the set
    expect(graph.edgeCount).toBe(7);
    expect(graph.edgeBetween(G_STAIRS, F_STAIRS)?.edgeTypeCode).toBe('stairs');
  });

  it('removes stairs for accessible routing', async () => {
    const graph = await assembleGraph(store, [FLOOR_GROUND, FLOOR_FIRST], { accessibleOnly: true });
    expect(graph.edgeBetween(G_STAIRS, F_STAIRS)).toBeUndefined();
    expect(graph.neighbors(G_ELEVATOR)).toHaveLength(2);
  });

  it('returns an empty graph for floors without nodes', async () => {
    const graph = await assembleGraph(store, [FLOOR_ROOF], { accessibleOnly: false });
    expect(graph).toBeInstanceOf(RoutingGraph);
    expect(graph.isEmpty).toBe(true);
  });

  it('needs at least one floor', async () => {
    await expect(assembleGraph(store, [], { accessibleOnly: false })).rejects.toThrow(RangeError);
  });
});
