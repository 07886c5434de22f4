import { compareIds } from '../utils/compare';
import { MinHeap } from '../utils/minHeap';
import type { GraphEdge, RoutingGraph } from './graphAssembler';

export interface SolvedPath {
  /** Vertex ids from source to target inclusive */
  path: string[];
  /** Edge taken into each vertex after the first (path.length - 1 entries) */
  edges: GraphEdge[];
  /** Sum of the traversed edge weights, in meters */
  distance: number;
}

interface QueueEntry {
  vertexId: string;
  distance: number;
}

// Equal distances pop in vertex id order, which keeps results stable.
const byDistanceThenId = (a: QueueEntry, b: QueueEntry): number =>
  a.distance - b.distance || compareIds(a.vertexId, b.vertexId);

/**
 * Dijkstra shortest path over an undirected graph with positive weights.
 *
 * Returns null when source and target are in different components. Both
 * vertices must exist in the graph.
 */
export function solveShortestPath(
  graph: RoutingGraph,
  sourceId: string,
  targetId: string,
): SolvedPath | null {
  if (!graph.hasVertex(sourceId) || !graph.hasVertex(targetId)) {
    throw new RangeError(`solveShortestPath: ${sourceId} or ${targetId} is not in the graph`);
  }
  if (sourceId === targetId) {
    return { path: [sourceId], edges: [], distance: 0 };
  }

  const dist = new Map<string, number>([[sourceId, 0]]);
  const previous = new Map<string, { vertexId: string; edge: GraphEdge }>();
  const settled = new Set<string>();
  const queue = new MinHeap<QueueEntry>(byDistanceThenId);
  queue.push({ vertexId: sourceId, distance: 0 });

  while (queue.size > 0) {
    const current = queue.pop();
    if (!current || settled.has(current.vertexId)) continue;
    settled.add(current.vertexId);
    if (current.vertexId === targetId) break;

    for (const { vertexId, edge } of graph.neighbors(current.vertexId)) {
      if (settled.has(vertexId)) continue;
      const candidate = current.distance + edge.weight;
      const known = dist.get(vertexId);
      if (known === undefined || candidate < known) {
        dist.set(vertexId, candidate);
        previous.set(vertexId, { vertexId: current.vertexId, edge });
        queue.push({ vertexId, distance: candidate });
      }
    }
  }

  if (!settled.has(targetId)) return null;

  const path: string[] = [targetId];
  const edges: GraphEdge[] = [];
  let cursor = targetId;
  for (let step = previous.get(cursor); step; step = previous.get(cursor)) {
    edges.push(step.edge);
    path.push(step.vertexId);
    cursor = step.vertexId;
  }
  path.reverse();
  edges.reverse();

  // Summed along the path so the reported total matches the edges exactly
  const distance = edges.reduce((sum, edge) => sum + edge.weight, 0);
  return { path, edges, distance };
}
