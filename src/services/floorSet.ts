import type { FloorStrategy } from '../config/routing';
import type { FloorConnection } from '../types/nodes';
import { compareIds } from '../utils/compare';
import type { RoutingStore } from './store/types';

export interface FloorSetRequest {
  originFloorId: string;
  destinationFloorId: string;
  /** Needed by the `connected` strategy to load floor adjacency */
  buildingId: string;
}

/**
 * Floors whose nodes and edges are loaded for one query.
 *
 * `endpoints` loads exactly the origin and destination floors, so a route
 * that has to pass through a third floor is reported as no route.
 * `connected` walks the building's floor adjacency (floors joined by any
 * vertical connector) and adds the floors on a fewest-hop chain between the
 * two endpoints.
 */
export async function resolveFloorSet(
  store: RoutingStore,
  request: FloorSetRequest,
  strategy: FloorStrategy,
): Promise<string[]> {
  const { originFloorId, destinationFloorId } = request;
  const endpoints = [...new Set([originFloorId, destinationFloorId])].sort(compareIds);

  if (strategy === 'endpoints' || originFloorId === destinationFloorId) {
    return endpoints;
  }

  const connections = await store.listFloorConnections(request.buildingId);
  const chain = findFloorChain(connections, originFloorId, destinationFloorId);
  if (!chain) return endpoints;

  return [...new Set(chain)].sort(compareIds);
}

/**
 * Breadth-first search over floor adjacency. Neighbours are visited in id
 * order so equal-length chains resolve the same way every time.
 */
export function findFloorChain(
  connections: readonly FloorConnection[],
  fromFloorId: string,
  toFloorId: string,
): string[] | null {
  const adjacency = new Map<string, Set<string>>();
  const link = (a: string, b: string) => {
    let set = adjacency.get(a);
    if (!set) {
      set = new Set();
      adjacency.set(a, set);
    }
    set.add(b);
  };
  for (const { fromFloorId: a, toFloorId: b } of connections) {
    if (a === b) continue;
    link(a, b);
    link(b, a);
  }

  const previous = new Map<string, string | null>([[fromFloorId, null]]);
  const queue: string[] = [fromFloorId];

  while (queue.length) {
    const floor = queue.shift();
    if (floor === undefined) break;
    if (floor === toFloorId) break;

    const neighbours = [...(adjacency.get(floor) ?? [])].sort(compareIds);
    for (const next of neighbours) {
      if (previous.has(next)) continue;
      previous.set(next, floor);
      queue.push(next);
    }
  }

  if (!previous.has(toFloorId)) return null;

  const chain: string[] = [];
  for (let cursor: string | null | undefined = toFloorId; cursor; cursor = previous.get(cursor)) {
    chain.push(cursor);
  }
  return chain.reverse();
}
