import neo4j from 'neo4j-driver';
import type { Driver, Record as Neo4jRecord, Session } from 'neo4j-driver';
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
import { parseJsonDocument, parseMetadata } from '../../utils/json';
import { InvariantViolationError } from '../errors';
import type { RoutingStore } from './types';

/**
 * RoutingStore backed by Neo4j.
 *
 * Layout: (:Building), (:Floor {building_id}), (:POI {floor_id}),
 * (:NodeType), (:EdgeType), (:RoutingNode {floor_id, node_type_id}) and
 * (:RoutingNode)-[:ROUTES_TO {id, distance, edge_type_id}]->(:RoutingNode).
 * JSON documents are stored as strings.
 */
export class Neo4jRoutingStore implements RoutingStore {
  constructor(
    private readonly driver: Driver,
    private readonly database = 'neo4j',
  ) {}

  async getBuilding(id: string): Promise<Building | null> {
    const records = await this.read(
      `
      MATCH (b:Building {id: $id})
      RETURN b.id AS id,
             b.name AS name,
             b.description AS description,
             b.footprint AS footprint,
             b.floor_count AS floorCount
      `,
      { id },
    );
    return records.length ? toBuilding(records[0]) : null;
  }

  async listFloorsByBuilding(buildingId: string): Promise<Floor[]> {
    const records = await this.read(
      `
      MATCH (f:Floor {building_id: $buildingId})
      RETURN ${FLOOR_FIELDS}
      ORDER BY f.level_number
      `,
      { buildingId },
    );
    return records.map(toFloor);
  }

  async getFloor(id: string): Promise<Floor | null> {
    const records = await this.read(
      `
      MATCH (f:Floor {id: $id})
      RETURN ${FLOOR_FIELDS}
      `,
      { id },
    );
    return records.length ? toFloor(records[0]) : null;
  }

  async getPoi(id: string): Promise<Poi | null> {
    const records = await this.read(
      `
      MATCH (p:POI {id: $id})
      RETURN ${POI_FIELDS}
      `,
      { id },
    );
    return records.length ? toPoi(records[0]) : null;
  }

  async listPoisByFloor(floorId: string): Promise<Poi[]> {
    const records = await this.read(
      `
      MATCH (p:POI {floor_id: $floorId})
      RETURN ${POI_FIELDS}
      ORDER BY p.name
      `,
      { floorId },
    );
    return records.map(toPoi);
  }

  async listNodeTypes(): Promise<NodeType[]> {
    const records = await this.read(
      `
      MATCH (t:NodeType)
      RETURN t.id AS id, t.code AS code, t.description AS description
      ORDER BY t.code
      `,
    );
    return records.map((record) => ({
      id: readString(record, 'id'),
      code: readString(record, 'code'),
      description: readOptionalString(record, 'description'),
    }));
  }

  async listEdgeTypes(): Promise<EdgeType[]> {
    const records = await this.read(
      `
      MATCH (t:EdgeType)
      RETURN t.id AS id,
             t.code AS code,
             coalesce(t.is_accessible, true) AS isAccessible,
             t.description AS description
      ORDER BY t.code
      `,
    );
    return records.map((record) => ({
      id: readString(record, 'id'),
      code: readString(record, 'code'),
      isAccessible: Boolean(record.get('isAccessible')),
      description: readOptionalString(record, 'description'),
    }));
  }

  async listNodesByFloors(floorIds: readonly string[]): Promise<RoutingNode[]> {
    if (!floorIds.length) return [];
    const records = await this.read(
      `
      MATCH (n:RoutingNode)
      WHERE n.floor_id IN $floorIds
      RETURN n.id AS id,
             n.floor_id AS floorId,
             n.node_type_id AS nodeTypeId,
             n.latitude AS latitude,
             n.longitude AS longitude
      ORDER BY n.id
      `,
      { floorIds: [...floorIds] },
    );
    return records.map((record) => ({
      id: readString(record, 'id'),
      floorId: readString(record, 'floorId'),
      nodeTypeId: readString(record, 'nodeTypeId'),
      latitude: readNumber(record, 'latitude'),
      longitude: readNumber(record, 'longitude'),
    }));
  }

  async listEdgesAmong(nodeIds: readonly string[]): Promise<RoutingEdgeRecord[]> {
    if (!nodeIds.length) return [];
    const records = await this.read(
      `
      MATCH (a:RoutingNode)-[r:ROUTES_TO]->(b:RoutingNode)
      WHERE a.id IN $nodeIds AND b.id IN $nodeIds
      MATCH (t:EdgeType {id: r.edge_type_id})
      RETURN r.id AS id,
             a.id AS fromNodeId,
             b.id AS toNodeId,
             r.edge_type_id AS edgeTypeId,
             r.distance AS distance,
             t.code AS edgeTypeCode,
             coalesce(t.is_accessible, true) AS isAccessible
      ORDER BY r.id
      `,
      { nodeIds: [...nodeIds] },
    );
    return records.map((record) => ({
      id: readString(record, 'id'),
      fromNodeId: readString(record, 'fromNodeId'),
      toNodeId: readString(record, 'toNodeId'),
      edgeTypeId: readString(record, 'edgeTypeId'),
      distance: readNumber(record, 'distance'),
      edgeTypeCode: readString(record, 'edgeTypeCode'),
      isAccessible: Boolean(record.get('isAccessible')),
    }));
  }

  async listFloorConnections(buildingId: string): Promise<FloorConnection[]> {
    const records = await this.read(
      `
      MATCH (fa:Floor {building_id: $buildingId})
      MATCH (a:RoutingNode {floor_id: fa.id})-[:ROUTES_TO]-(b:RoutingNode)
      WHERE b.floor_id <> a.floor_id
      MATCH (fb:Floor {id: b.floor_id, building_id: $buildingId})
      RETURN DISTINCT fa.id AS fromFloorId, fb.id AS toFloorId
      `,
      { buildingId },
    );
    return records.map((record) => ({
      fromFloorId: readString(record, 'fromFloorId'),
      toFloorId: readString(record, 'toFloorId'),
    }));
  }

  async ping(): Promise<void> {
    await this.driver.getServerInfo({ database: this.database });
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async read(
    query: string,
    params: Record<string, unknown> = {},
  ): Promise<Neo4jRecord[]> {
    const session: Session = this.driver.session({
      database: this.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      const { records } = await session.executeRead((tx) => tx.run(query, params));
      return records;
    } finally {
      await session.close();
    }
  }
}

const FLOOR_FIELDS = `
  f.id AS id,
  f.building_id AS buildingId,
  f.level_number AS levelNumber,
  f.name AS name,
  f.height_meters AS heightMeters,
  f.floor_geojson AS floorGeojson`;

const POI_FIELDS = `
  p.id AS id,
  p.floor_id AS floorId,
  p.name AS name,
  p.type AS type,
  p.latitude AS latitude,
  p.longitude AS longitude,
  p.metadata AS metadata`;

function toBuilding(record: Neo4jRecord): Building {
  return {
    id: readString(record, 'id'),
    name: readString(record, 'name'),
    description: readOptionalString(record, 'description'),
    footprint: parseJsonDocument(record.get('footprint')),
    floorCount: readNumber(record, 'floorCount'),
  };
}

function toFloor(record: Neo4jRecord): Floor {
  return {
    id: readString(record, 'id'),
    buildingId: readString(record, 'buildingId'),
    levelNumber: readNumber(record, 'levelNumber'),
    name: readString(record, 'name'),
    heightMeters: readNumber(record, 'heightMeters'),
    floorGeojson: parseJsonDocument(record.get('floorGeojson')),
  };
}

function toPoi(record: Neo4jRecord): Poi {
  return {
    id: readString(record, 'id'),
    floorId: readString(record, 'floorId'),
    name: readString(record, 'name'),
    type: readString(record, 'type'),
    latitude: readNumber(record, 'latitude'),
    longitude: readNumber(record, 'longitude'),
    metadata: parseMetadata(record.get('metadata')),
  };
}

function readString(record: Neo4jRecord, key: string): string {
  const value: unknown = record.get(key);
  if (typeof value !== 'string') {
    throw new InvariantViolationError(`Expected string for "${key}", got ${typeof value}`);
  }
  return value;
}

function readOptionalString(record: Neo4jRecord, key: string): string | null {
  const value: unknown = record.get(key);
  return typeof value === 'string' ? value : null;
}

// Integer properties come back as neo4j Integers unless written as floats.
function readNumber(record: Neo4jRecord, key: string): number {
  const value: unknown = record.get(key);
  if (neo4j.isInt(value)) return value.toNumber();
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new InvariantViolationError(`Expected number for "${key}", got ${String(value)}`);
}
