import type { Coordinates, RoutingEdgeRecord, RoutingNode } from '../types/nodes';
import { compareIds } from '../utils/compare';
import { InvariantViolationError } from './errors';
import type { RoutingStore } from './store/types';

export interface GraphVertex extends Coordinates {
  id: string;
  floorId: string;
  nodeTypeId: string;
}

export interface GraphEdge {
  id: string;
  /** Endpoints as stored; traversal ignores direction */
  from: string;
  to: string;
  weight: number;
  edgeTypeCode: string;
  accessible: boolean;
}

/** An edge seen from one of its endpoints */
export interface Adjacent {
  vertexId: string;
  edge: GraphEdge;
}

/**
 * Query-scoped, undirected, weighted graph. Owns its vertices and edges for
 * the lifetime of one routing query (or one cache entry); nothing mutates it
 * after assembly.
 */
export class RoutingGraph {
  private readonly vertexMap = new Map<string, GraphVertex>();
  private readonly adjacency = new Map<string, Adjacent[]>();
  private readonly edgeList: GraphEdge[] = [];

  constructor(
    vertices: readonly GraphVertex[],
    edges: readonly GraphEdge[],
  ) {
    for (const vertex of [...vertices].sort((a, b) => compareIds(a.id, b.id))) {
      this.vertexMap.set(vertex.id, vertex);
      this.adjacency.set(vertex.id, []);
    }

    for (const edge of [...edges].sort((a, b) => compareIds(a.id, b.id))) {
      if (!Number.isFinite(edge.weight) || edge.weight <= 0) {
        throw new InvariantViolationError(
          `Routing edge ${edge.id} has non-positive distance ${edge.weight}`,
        );
      }
      const fromList = this.adjacency.get(edge.from);
      const toList = this.adjacency.get(edge.to);
      // Never keep an edge with an endpoint outside the loaded node set
      if (!fromList || !toList) continue;

      this.edgeList.push(edge);
      fromList.push({ vertexId: edge.to, edge });
      if (edge.from !== edge.to) {
        toList.push({ vertexId: edge.from, edge });
      }
    }
  }

  get vertexCount(): number {
    return this.vertexMap.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  get isEmpty(): boolean {
    return this.vertexMap.size === 0;
  }

  hasVertex(id: string): boolean {
    return this.vertexMap.has(id);
  }

  vertex(id: string): GraphVertex | undefined {
    return this.vertexMap.get(id);
  }

  edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  neighbors(id: string): readonly Adjacent[] {
    return this.adjacency.get(id) ?? [];
  }

  /** Lightest edge joining `a` and `b` in either direction. */
  edgeBetween(a: string, b: string): GraphEdge | undefined {
    let best: GraphEdge | undefined;
    for (const { vertexId, edge } of this.neighbors(a)) {
      if (vertexId !== b) continue;
      if (!best || edge.weight < best.weight) best = edge;
    }
    return best;
  }

  /** Distinct floor ids present in the graph, sorted. */
  floorIds(): string[] {
    const floors = new Set<string>();
    for (const vertex of this.vertexMap.values()) floors.add(vertex.floorId);
    return [...floors].sort(compareIds);
  }
}

export interface AssembleOptions {
  /** Drop edges whose EdgeType is not wheelchair-accessible */
  accessibleOnly: boolean;
}

/**
 * Builds the routing graph for a set of floors: every node on those floors and
 * every edge whose two endpoints were loaded. Cross-floor connectivity comes
 * only from edges whose endpoints sit on different floors.
 *
 * Returns an empty graph when the floors have no routing nodes.
 */
export async function assembleGraph(
  store: RoutingStore,
  floorIds: readonly string[],
  options: AssembleOptions,
): Promise<RoutingGraph> {
  if (!floorIds.length) {
    throw new RangeError('assembleGraph needs at least one floor id');
  }

  const nodes = await store.listNodesByFloors([...new Set(floorIds)]);
  if (!nodes.length) {
    return new RoutingGraph([], []);
  }

  const edges = await store.listEdgesAmong(nodes.map((n) => n.id));
  return buildRoutingGraph(nodes, edges, options);
}

export function buildRoutingGraph(
  nodes: readonly RoutingNode[],
  edges: readonly RoutingEdgeRecord[],
  { accessibleOnly }: AssembleOptions,
): RoutingGraph {
  const vertices: GraphVertex[] = nodes.map((node) => ({
    id: node.id,
    floorId: node.floorId,
    nodeTypeId: node.nodeTypeId,
    latitude: node.latitude,
    longitude: node.longitude,
  }));

  const graphEdges: GraphEdge[] = edges
    .filter((edge) => !accessibleOnly || edge.isAccessible)
    .map((edge) => ({
      id: edge.id,
      from: edge.fromNodeId,
      to: edge.toNodeId,
      weight: edge.distance,
      edgeTypeCode: edge.edgeTypeCode,
      accessible: edge.isAccessible,
    }));

  return new RoutingGraph(vertices, graphEdges);
}
