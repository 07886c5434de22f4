/**
 * Grid-based nearest-waypoint index for a single floor.
 *
 * Nodes are bucketed into square cells on a flat-earth projection centered on
 * the floor. A query scans rings of cells outward from the query cell and
 * stops once every unscanned cell is farther away than the best match, so the
 * answer is the same as a linear scan over the floor's nodes.
 */

import type { Coordinates, RoutingNode } from '../types/nodes';
import { haversineDistance, METERS_PER_DEG_LAT, toRadians } from '../utils/math';
import { compareIds } from '../utils/compare';

/** Default grid cell size in meters */
export const DEFAULT_CELL_SIZE = 10;

// The planar projection and the haversine metric disagree slightly; keep
// scanning rings until they are clearly out of reach.
const RING_SLACK = 1.01;

const MAX_CELLS_PER_NODE = 4;

export interface NearestNode {
  node: RoutingNode;
  /** Great-circle distance from the query point, in meters */
  distance: number;
}

export class FloorSpatialIndex {
  /** cell key -> nodes in that cell */
  private readonly grid = new Map<string, RoutingNode[]>();
  private readonly metersPerDegLng: number;
  private readonly originLat: number;
  private readonly originLng: number;
  private minCellX = 0;
  private maxCellX = 0;
  private minCellY = 0;
  private maxCellY = 0;

  readonly size: number;

  private constructor(
    readonly floorId: string,
    nodes: readonly RoutingNode[],
    private readonly cellSize: number,
  ) {
    let sumLat = 0;
    let sumLng = 0;
    for (const node of nodes) {
      sumLat += node.latitude;
      sumLng += node.longitude;
    }
    this.originLat = nodes.length ? sumLat / nodes.length : 0;
    this.originLng = nodes.length ? sumLng / nodes.length : 0;
    this.metersPerDegLng = METERS_PER_DEG_LAT * Math.cos(toRadians(this.originLat));

    this.size = nodes.length;
    this.insertAll(nodes);
  }

  /**
   * Builds the index from the floor's routing nodes. Nodes that belong to
   * another floor are ignored.
   */
  static build(
    floorId: string,
    nodes: readonly RoutingNode[],
    cellSizeMeters: number = DEFAULT_CELL_SIZE,
  ): FloorSpatialIndex {
    if (!(cellSizeMeters > 0)) {
      throw new RangeError(`cell size must be positive, got ${cellSizeMeters}`);
    }
    const onFloor = nodes.filter((node) => node.floorId === floorId);
    return new FloorSpatialIndex(floorId, onFloor, cellSizeMeters);
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Nearest routing node to `coord`, or null when the floor has no nodes.
   * Equal distances resolve to the lowest node id.
   */
  nearest(coord: Coordinates): NearestNode | null {
    if (this.isEmpty) return null;

    const [qx, qy] = this.cellOf(coord);
    const maxRing = Math.max(
      Math.abs(qx - this.minCellX),
      Math.abs(this.maxCellX - qx),
      Math.abs(qy - this.minCellY),
      Math.abs(this.maxCellY - qy),
    );

    let best: NearestNode | null = null;
    let cellsVisited = 0;

    for (let ring = 0; ring <= maxRing; ring++) {
      // Every node in ring r is at least (r - 1) cells away on the plane.
      if (best && (ring - 1) * this.cellSize > best.distance * RING_SLACK) break;

      // Far from the floor the rings are mostly empty; a plain scan is cheaper.
      cellsVisited += ring === 0 ? 1 : 8 * ring;
      if (cellsVisited > MAX_CELLS_PER_NODE * this.size + 9) {
        return this.scanAll(coord);
      }

      for (const node of this.ringNodes(qx, qy, ring)) {
        best = closer(best, node, haversineDistance(coord, node));
      }
    }

    return best;
  }

  private scanAll(coord: Coordinates): NearestNode | null {
    let best: NearestNode | null = null;
    for (const bucket of this.grid.values()) {
      for (const node of bucket) {
        best = closer(best, node, haversineDistance(coord, node));
      }
    }
    return best;
  }

  private insertAll(nodes: readonly RoutingNode[]): void {
    let first = true;
    for (const node of nodes) {
      const [cx, cy] = this.cellOf(node);
      const key = cellKey(cx, cy);
      const bucket = this.grid.get(key);
      if (bucket) {
        bucket.push(node);
      } else {
        this.grid.set(key, [node]);
      }

      if (first) {
        this.minCellX = this.maxCellX = cx;
        this.minCellY = this.maxCellY = cy;
        first = false;
      } else {
        this.minCellX = Math.min(this.minCellX, cx);
        this.maxCellX = Math.max(this.maxCellX, cx);
        this.minCellY = Math.min(this.minCellY, cy);
        this.maxCellY = Math.max(this.maxCellY, cy);
      }
    }
  }

  private cellOf(coord: Coordinates): [number, number] {
    const x = (coord.longitude - this.originLng) * this.metersPerDegLng;
    const y = (coord.latitude - this.originLat) * METERS_PER_DEG_LAT;
    return [Math.floor(x / this.cellSize), Math.floor(y / this.cellSize)];
  }

  /** Nodes in the cells at Chebyshev distance `ring` from (cx, cy). */
  private *ringNodes(cx: number, cy: number, ring: number): Generator<RoutingNode> {
    if (ring === 0) {
      yield* this.grid.get(cellKey(cx, cy)) ?? [];
      return;
    }
    for (let dx = -ring; dx <= ring; dx++) {
      const onEdgeColumn = dx === -ring || dx === ring;
      for (let dy = -ring; dy <= ring; dy += onEdgeColumn ? 1 : 2 * ring) {
        yield* this.grid.get(cellKey(cx + dx, cy + dy)) ?? [];
      }
    }
  }
}

function closer(
  best: NearestNode | null,
  node: RoutingNode,
  distance: number,
): NearestNode | null {
  if (
    !best ||
    distance < best.distance ||
    (distance === best.distance && compareIds(node.id, best.node.id) < 0)
  ) {
    return { node, distance };
  }
  return best;
}

function cellKey(cx: number, cy: number): string {
  return `${cx},${cy}`;
}
