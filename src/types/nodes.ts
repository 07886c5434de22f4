export interface Coordinates {
  latitude: number;
  longitude: number;
}

// GeoJSON position order: [longitude, latitude]
export type LngLat = [number, number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type GeoJsonObject = { [key: string]: JsonValue };

export interface Building {
  id: string;
  name: string;
  description: string | null;
  footprint: GeoJsonObject | null;
  floorCount: number;
}

export interface Floor {
  id: string;
  buildingId: string;
  levelNumber: number; // -1 (basement), 0 (ground), 1, 2...
  name: string;
  heightMeters: number;
  floorGeojson: GeoJsonObject | null;
}

export interface Poi extends Coordinates {
  id: string;
  floorId: string;
  name: string;
  type: string; // restroom, shop, elevator...
  metadata: Record<string, JsonValue>;
}

export interface NodeType {
  id: string;
  code: string; // hallway, door, stairwell, elevator, entrance, exit
  description: string | null;
}

export interface EdgeType {
  id: string;
  code: string; // hallway, stairs, elevator, escalator, ramp
  isAccessible: boolean;
  description: string | null;
}

export interface RoutingNode extends Coordinates {
  id: string;
  floorId: string;
  nodeTypeId: string;
}

export interface RoutingEdge {
  id: string;
  fromNodeId: string;
  toNodeId: string;
  edgeTypeId: string;
  distance: number; // meters
}

/** A RoutingEdge joined with the EdgeType fields routing needs. */
export interface RoutingEdgeRecord extends RoutingEdge {
  edgeTypeCode: string;
  isAccessible: boolean;
}

export interface FloorConnection {
  fromFloorId: string;
  toFloorId: string;
}
