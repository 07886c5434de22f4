import type { RoutingEdgeRecord, RoutingNode } from '../types/nodes';
import type { BuildingDataset } from '../services/store/memoryStore';

/** Deterministic v4-shaped UUID: id(7) -> 00000000-0000-4000-8000-000000000007 */
export function id(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

const BASE_LAT = 45.0;
const BASE_LNG = -93.0;

/** Offsets in 1e-4 degree units from a fixed origin */
export function at(dLat: number, dLng: number): { latitude: number; longitude: number } {
  return { latitude: BASE_LAT + dLat * 1e-4, longitude: BASE_LNG + dLng * 1e-4 };
}

export const BUILDING = id(1);
export const FLOOR_GROUND = id(10);
export const FLOOR_FIRST = id(11);
export const FLOOR_SECOND = id(12);
export const FLOOR_ROOF = id(13);

export const NODE_TYPE_HALLWAY = id(20);
export const NODE_TYPE_ELEVATOR = id(21);
export const NODE_TYPE_STAIRWELL = id(22);

export const EDGE_TYPE_HALLWAY = id(30);
export const EDGE_TYPE_STAIRS = id(31);
export const EDGE_TYPE_ELEVATOR = id(32);

// Ground
export const G_ENTRANCE = id(100);
export const G_HALL = id(101);
export const G_ELEVATOR = id(102);
export const G_STAIRS = id(103);
// First
export const F_ELEVATOR = id(110);
export const F_STAIRS = id(111);
export const F_HALL = id(112);
// Second
export const S_STAIRS = id(120);
export const S_LAB = id(121);

export const POI_CAFE = id(200);
export const POI_LIBRARY = id(201);
export const POI_LAB = id(202);
export const POI_ROOF = id(203);

export const ELEVATOR_EDGE = id(304);

/**
 * Three routable floors and a roof without routing nodes.
 *
 *   ground: entrance -10- hall -5- elevator, hall -5- stairs
 *   elevator(8, accessible) first.elevator, stairs(3) first.stairs
 *   first: elevator -6- hall, stairs -6- hall
 *   stairs(3) second.stairs -7- lab
 *
 * Entrance to the library is 24m by stairs and 29m by elevator.
 */
export function buildingDataset(options: { withElevator?: boolean } = {}): BuildingDataset {
  const withElevator = options.withElevator ?? true;

  const edges = [
    edge(300, G_ENTRANCE, G_HALL, EDGE_TYPE_HALLWAY, 10),
    edge(301, G_HALL, G_ELEVATOR, EDGE_TYPE_HALLWAY, 5),
    edge(302, G_HALL, G_STAIRS, EDGE_TYPE_HALLWAY, 5),
    edge(303, G_STAIRS, F_STAIRS, EDGE_TYPE_STAIRS, 3),
    edge(304, G_ELEVATOR, F_ELEVATOR, EDGE_TYPE_ELEVATOR, 8),
    edge(305, F_ELEVATOR, F_HALL, EDGE_TYPE_HALLWAY, 6),
    edge(306, F_STAIRS, F_HALL, EDGE_TYPE_HALLWAY, 6),
    edge(307, F_STAIRS, S_STAIRS, EDGE_TYPE_STAIRS, 3),
    edge(308, S_STAIRS, S_LAB, EDGE_TYPE_HALLWAY, 7),
  ].filter((e) => withElevator || e.id !== ELEVATOR_EDGE);

  return {
    buildings: [
      { id: BUILDING, name: 'Test Hall', description: null, footprint: null, floorCount: 4 },
    ],
    floors: [
      floor(FLOOR_GROUND, 0, 'Ground'),
      floor(FLOOR_FIRST, 1, 'First'),
      floor(FLOOR_SECOND, 2, 'Second'),
      floor(FLOOR_ROOF, 3, 'Roof'),
    ],
    pois: [
      { id: POI_CAFE, floorId: FLOOR_GROUND, name: 'Cafe', type: 'shop', metadata: {}, ...at(0, 2) },
      { id: POI_LIBRARY, floorId: FLOOR_FIRST, name: 'Library', type: 'room', metadata: {}, ...at(0, 4) },
      { id: POI_LAB, floorId: FLOOR_SECOND, name: 'Lab', type: 'room', metadata: {}, ...at(0, 6) },
      { id: POI_ROOF, floorId: FLOOR_ROOF, name: 'Terrace', type: 'outdoor', metadata: {}, ...at(0, 0) },
    ],
    nodeTypes: [
      { id: NODE_TYPE_HALLWAY, code: 'hallway', description: null },
      { id: NODE_TYPE_ELEVATOR, code: 'elevator', description: null },
      { id: NODE_TYPE_STAIRWELL, code: 'stairwell', description: null },
    ],
    edgeTypes: [
      { id: EDGE_TYPE_HALLWAY, code: 'hallway', isAccessible: true, description: null },
      { id: EDGE_TYPE_STAIRS, code: 'stairs', isAccessible: false, description: null },
      { id: EDGE_TYPE_ELEVATOR, code: 'elevator', isAccessible: true, description: null },
    ],
    nodes: [
      node(G_ENTRANCE, FLOOR_GROUND, NODE_TYPE_HALLWAY, 0, 0),
      node(G_HALL, FLOOR_GROUND, NODE_TYPE_HALLWAY, 0, 2),
      node(G_ELEVATOR, FLOOR_GROUND, NODE_TYPE_ELEVATOR, 1, 2),
      node(G_STAIRS, FLOOR_GROUND, NODE_TYPE_STAIRWELL, -1, 2),
      node(F_ELEVATOR, FLOOR_FIRST, NODE_TYPE_ELEVATOR, 1, 2),
      node(F_STAIRS, FLOOR_FIRST, NODE_TYPE_STAIRWELL, -1, 2),
      node(F_HALL, FLOOR_FIRST, NODE_TYPE_HALLWAY, 0, 4),
      node(S_STAIRS, FLOOR_SECOND, NODE_TYPE_STAIRWELL, -1, 2),
      node(S_LAB, FLOOR_SECOND, NODE_TYPE_HALLWAY, 0, 6),
    ],
    edges,
  };
}

function floor(floorId: string, levelNumber: number, name: string) {
  return { id: floorId, buildingId: BUILDING, levelNumber, name, heightMeters: 4, floorGeojson: null };
}

function node(nodeId: string, floorId: string, nodeTypeId: string, dLat: number, dLng: number): RoutingNode {
  return { id: nodeId, floorId, nodeTypeId, ...at(dLat, dLng) };
}

function edge(n: number, fromNodeId: string, toNodeId: string, edgeTypeId: string, distance: number) {
  return { id: id(n), fromNodeId, toNodeId, edgeTypeId, distance };
}

/** A node on one floor for graph-level tests that need no store. */
export function plainNode(nodeId: string, floorId = 'floor-a', dLat = 0, dLng = 0): RoutingNode {
  return { id: nodeId, floorId, nodeTypeId: 'hallway', ...at(dLat, dLng) };
}

export function plainEdge(
  edgeId: string,
  fromNodeId: string,
  toNodeId: string,
  distance: number,
  isAccessible = true,
): RoutingEdgeRecord {
  return {
    id: edgeId,
    fromNodeId,
    toNodeId,
    edgeTypeId: isAccessible ? 'hallway' : 'stairs',
    edgeTypeCode: isAccessible ? 'hallway' : 'stairs',
    isAccessible,
    distance,
  };
}
