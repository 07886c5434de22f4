import type { FloorGrouping } from '../../config/routing';
import type { RoutingGraph } from '../../services/graphAssembler';
import type { LngLat } from '../../types/nodes';

export interface FloorPath {
  floorId: string;
  path: LngLat[];
}

/**
 * Splits a solved vertex path into per-floor coordinate runs.
 *
 * - `merge`: one group per floor, in order of first appearance. A floor the
 *   path leaves and later comes back to keeps appending to its first group.
 * - `split`: a new group at every floor change, so a revisited floor shows up
 *   as a second leg.
 */
export function groupPathByFloor(
  graph: RoutingGraph,
  path: readonly string[],
  grouping: FloorGrouping = 'merge',
): FloorPath[] {
  const groups: FloorPath[] = [];
  const byFloor = new Map<string, FloorPath>();
  let current: FloorPath | undefined;

  for (const vertexId of path) {
    const vertex = graph.vertex(vertexId);
    if (!vertex) {
      throw new RangeError(`groupPathByFloor: vertex ${vertexId} is not in the graph`);
    }
    const position: LngLat = [vertex.longitude, vertex.latitude];

    if (grouping === 'split') {
      if (!current || current.floorId !== vertex.floorId) {
        current = { floorId: vertex.floorId, path: [] };
        groups.push(current);
      }
      current.path.push(position);
      continue;
    }

    let group = byFloor.get(vertex.floorId);
    if (!group) {
      group = { floorId: vertex.floorId, path: [] };
      byFloor.set(vertex.floorId, group);
      groups.push(group);
    }
    group.path.push(position);
  }

  return groups;
}
