import type { RoutingGraph } from '../../services/graphAssembler';
import { roundTo } from '../math';

export const ARRIVED = 'You have arrived';
export const ARRIVED_AT_DESTINATION = 'You have arrived at your destination';
export const HEAD_TOWARDS_DESTINATION = 'Head towards destination';

export interface InstructionOptions {
  /** Emit a distance marker every N vertices (default 5) */
  markerInterval?: number;
  /** Display name for a floor id; the id itself when absent */
  floorLabel?: (floorId: string) => string;
}

/**
 * Turns a solved path into short, human-readable steps: a start line, one
 * line per floor change, a distance marker every few vertices and the
 * arrival line. Depends only on the path and the graph, so identical paths
 * give identical steps.
 */
export function generateInstructions(
  graph: RoutingGraph,
  path: readonly string[],
  options: InstructionOptions = {},
): string[] {
  if (path.length === 0) return [ARRIVED];

  const markerInterval = options.markerInterval ?? 5;
  const label = options.floorLabel ?? ((floorId: string) => floorId);
  const floorOf = (vertexId: string): string => {
    const vertex = graph.vertex(vertexId);
    if (!vertex) {
      throw new RangeError(`generateInstructions: vertex ${vertexId} is not in the graph`);
    }
    return vertex.floorId;
  };

  const steps: string[] = [];
  const firstFloor = floorOf(path[0]);
  const lastFloor = floorOf(path[path.length - 1]);
  steps.push(
    firstFloor === lastFloor ? HEAD_TOWARDS_DESTINATION : `Start on floor ${label(firstFloor)}`,
  );

  let currentFloor = firstFloor;
  for (let i = 1; i < path.length; i++) {
    const floorId = floorOf(path[i]);
    if (floorId !== currentFloor) {
      steps.push(`Change to floor ${label(floorId)}`);
      currentFloor = floorId;
    }

    if (i % markerInterval === 0 && i < path.length - 1) {
      const edge = graph.edgeBetween(path[i - 1], path[i]);
      if (edge) {
        steps.push(`Continue straight for ${roundTo(edge.weight, 1)}m`);
      }
    }
  }

  steps.push(ARRIVED_AT_DESTINATION);
  return steps;
}
