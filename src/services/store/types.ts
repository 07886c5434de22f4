import type {
  Building,
  EdgeType,
  Floor,
  FloorConnection,
  NodeType,
  Poi,
  RoutingEdgeRecord,
  RoutingNode,
} from '../../types/nodes';

/**
 * Read-only access to building data. Routing never writes through this
 * interface; authoring happens elsewhere.
 */
export interface RoutingStore {
  getBuilding(id: string): Promise<Building | null>;
  listFloorsByBuilding(buildingId: string): Promise<Floor[]>;
  getFloor(id: string): Promise<Floor | null>;
  getPoi(id: string): Promise<Poi | null>;
  listPoisByFloor(floorId: string): Promise<Poi[]>;
  listNodeTypes(): Promise<NodeType[]>;
  listEdgeTypes(): Promise<EdgeType[]>;

  listNodesByFloors(floorIds: readonly string[]): Promise<RoutingNode[]>;
  /** Edges whose two endpoints are both in `nodeIds`, joined with their EdgeType. */
  listEdgesAmong(nodeIds: readonly string[]): Promise<RoutingEdgeRecord[]>;
  /** Pairs of floors in a building joined by at least one vertical connector. */
  listFloorConnections(buildingId: string): Promise<FloorConnection[]>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
