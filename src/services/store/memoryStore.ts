import { readFile } from 'fs/promises';
import type {
  Building,
  EdgeType,
  Floor,
  FloorConnection,
  NodeType,
  Poi,
  RoutingEdge,
  RoutingEdgeRecord,
  RoutingNode,
} from '../../types/nodes';
import { compareIds } from '../../utils/compare';
import { BuildingDatasetSchema } from './datasetSchema';
import type { RoutingStore } from './types';

export interface BuildingDataset {
  buildings: Building[];
  floors: Floor[];
  pois: Poi[];
  nodeTypes: NodeType[];
  edgeTypes: EdgeType[];
  nodes: RoutingNode[];
  edges: RoutingEdge[];
}

/**
 * RoutingStore over a dataset held in memory. Used for local runs
 * (ROUTING_STORE=memory) and as the stand-in database in tests.
 */
export class InMemoryRoutingStore implements RoutingStore {
  private readonly buildings = new Map<string, Building>();
  private readonly floors = new Map<string, Floor>();
  private readonly pois = new Map<string, Poi>();
  private readonly nodes = new Map<string, RoutingNode>();
  private readonly edgeTypes = new Map<string, EdgeType>();
  private readonly nodeTypes: NodeType[];
  private readonly edges: RoutingEdge[];

  constructor(dataset: BuildingDataset) {
    validateDataset(dataset);
    for (const b of dataset.buildings) this.buildings.set(b.id, b);
    for (const f of dataset.floors) this.floors.set(f.id, f);
    for (const p of dataset.pois) this.pois.set(p.id, p);
    for (const n of dataset.nodes) this.nodes.set(n.id, n);
    for (const t of dataset.edgeTypes) this.edgeTypes.set(t.id, t);
    this.nodeTypes = [...dataset.nodeTypes].sort((a, b) => a.code.localeCompare(b.code));
    this.edges = [...dataset.edges].sort((a, b) => compareIds(a.id, b.id));
  }

  static async fromFile(path: string): Promise<InMemoryRoutingStore> {
    const raw = await readFile(path, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return new InMemoryRoutingStore(parseDataset(parsed, path));
  }

  async getBuilding(id: string): Promise<Building | null> {
    return this.buildings.get(id) ?? null;
  }

  async listFloorsByBuilding(buildingId: string): Promise<Floor[]> {
    return [...this.floors.values()]
      .filter((f) => f.buildingId === buildingId)
      .sort((a, b) => a.levelNumber - b.levelNumber);
  }

  async getFloor(id: string): Promise<Floor | null> {
    return this.floors.get(id) ?? null;
  }

  async getPoi(id: string): Promise<Poi | null> {
    return this.pois.get(id) ?? null;
  }

  async listPoisByFloor(floorId: string): Promise<Poi[]> {
    return [...this.pois.values()]
      .filter((p) => p.floorId === floorId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async listNodeTypes(): Promise<NodeType[]> {
    return [...this.nodeTypes];
  }

  async listEdgeTypes(): Promise<EdgeType[]> {
    return [...this.edgeTypes.values()].sort((a, b) => a.code.localeCompare(b.code));
  }

  async listNodesByFloors(floorIds: readonly string[]): Promise<RoutingNode[]> {
    const wanted = new Set(floorIds);
    return [...this.nodes.values()]
      .filter((n) => wanted.has(n.floorId))
      .sort((a, b) => compareIds(a.id, b.id));
  }

  async listEdgesAmong(nodeIds: readonly string[]): Promise<RoutingEdgeRecord[]> {
    const wanted = new Set(nodeIds);
    const records: RoutingEdgeRecord[] = [];
    for (const edge of this.edges) {
      if (!wanted.has(edge.fromNodeId) || !wanted.has(edge.toNodeId)) continue;
      const type = this.edgeTypes.get(edge.edgeTypeId);
      if (!type) continue;
      records.push({ ...edge, edgeTypeCode: type.code, isAccessible: type.isAccessible });
    }
    return records;
  }

  async listFloorConnections(buildingId: string): Promise<FloorConnection[]> {
    const seen = new Set<string>();
    const connections: FloorConnection[] = [];
    const add = (fromFloorId: string, toFloorId: string) => {
      const key = `${fromFloorId}|${toFloorId}`;
      if (seen.has(key)) return;
      seen.add(key);
      connections.push({ fromFloorId, toFloorId });
    };

    for (const edge of this.edges) {
      const from = this.nodes.get(edge.fromNodeId);
      const to = this.nodes.get(edge.toNodeId);
      if (!from || !to || from.floorId === to.floorId) continue;
      if (
        this.floors.get(from.floorId)?.buildingId !== buildingId ||
        this.floors.get(to.floorId)?.buildingId !== buildingId
      ) {
        continue;
      }
      add(from.floorId, to.floorId);
      add(to.floorId, from.floorId);
    }
    return connections;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}

/**
 * Enforces the data invariants the routing engine relies on. Throws on the
 * first violation, naming the offending record.
 */
export function validateDataset(dataset: BuildingDataset): void {
  const buildingIds = new Set(dataset.buildings.map((b) => b.id));
  const floorIds = new Set<string>();
  const levels = new Set<string>();

  for (const floor of dataset.floors) {
    if (!buildingIds.has(floor.buildingId)) {
      throw new Error(`Floor ${floor.id} references unknown building ${floor.buildingId}`);
    }
    if (!(floor.heightMeters > 0)) {
      throw new Error(`Floor ${floor.id} must have a positive height`);
    }
    const levelKey = `${floor.buildingId}|${floor.levelNumber}`;
    if (levels.has(levelKey)) {
      throw new Error(`Duplicate level ${floor.levelNumber} in building ${floor.buildingId}`);
    }
    levels.add(levelKey);
    floorIds.add(floor.id);
  }

  for (const poi of dataset.pois) {
    if (!floorIds.has(poi.floorId)) {
      throw new Error(`POI ${poi.id} references unknown floor ${poi.floorId}`);
    }
  }

  const nodeTypeIds = new Set(dataset.nodeTypes.map((t) => t.id));
  const edgeTypeIds = new Set(dataset.edgeTypes.map((t) => t.id));
  const nodeIds = new Set<string>();
  for (const node of dataset.nodes) {
    if (!floorIds.has(node.floorId)) {
      throw new Error(`Routing node ${node.id} references unknown floor ${node.floorId}`);
    }
    if (!nodeTypeIds.has(node.nodeTypeId)) {
      throw new Error(`Routing node ${node.id} references unknown node type ${node.nodeTypeId}`);
    }
    nodeIds.add(node.id);
  }

  const pairs = new Set<string>();
  for (const edge of dataset.edges) {
    if (!nodeIds.has(edge.fromNodeId) || !nodeIds.has(edge.toNodeId)) {
      throw new Error(`Routing edge ${edge.id} references an unknown node`);
    }
    if (!edgeTypeIds.has(edge.edgeTypeId)) {
      throw new Error(`Routing edge ${edge.id} references unknown edge type ${edge.edgeTypeId}`);
    }
    if (!(edge.distance > 0)) {
      throw new Error(`Routing edge ${edge.id} must have a positive distance`);
    }
    const pair = `${edge.fromNodeId}|${edge.toNodeId}`;
    if (pairs.has(pair)) {
      throw new Error(`Duplicate routing edge ${edge.fromNodeId} -> ${edge.toNodeId}`);
    }
    pairs.add(pair);
  }
}

/** Validates a parsed dataset file; `source` names it in the error. */
export function parseDataset(value: unknown, source: string): BuildingDataset {
  const result = BuildingDatasetSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`${source}: invalid dataset at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return result.data;
}
