import { z } from 'zod';
import type { JsonValue } from '../../types/nodes';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const DocumentSchema = z.record(JsonValueSchema);

// Ids are stored lower-case so they match what the HTTP layer parses
const Id = z
  .string()
  .uuid()
  .transform((value) => value.toLowerCase());

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

export const BuildingSchema = z.object({
  id: Id,
  name: z.string().min(1),
  description: z.string().nullable().default(null),
  footprint: DocumentSchema.nullable().default(null),
  floorCount: z.number().int().min(0),
});

export const FloorSchema = z.object({
  id: Id,
  buildingId: Id,
  levelNumber: z.number().int(),
  name: z.string().min(1),
  heightMeters: z.number().positive(),
  floorGeojson: DocumentSchema.nullable().default(null),
});

export const PoiSchema = z.object({
  id: Id,
  floorId: Id,
  name: z.string().min(1),
  type: z.string().min(1),
  latitude,
  longitude,
  metadata: z.record(JsonValueSchema).default({}),
});

export const NodeTypeSchema = z.object({
  id: Id,
  code: z.string().min(1),
  description: z.string().nullable().default(null),
});

export const EdgeTypeSchema = z.object({
  id: Id,
  code: z.string().min(1),
  isAccessible: z.boolean().default(true),
  description: z.string().nullable().default(null),
});

export const RoutingNodeSchema = z.object({
  id: Id,
  floorId: Id,
  nodeTypeId: Id,
  latitude,
  longitude,
});

export const RoutingEdgeSchema = z.object({
  id: Id,
  fromNodeId: Id,
  toNodeId: Id,
  edgeTypeId: Id,
  distance: z.number().positive(),
});

/** Shape of a building dataset file (ROUTING_DATA_FILE). */
export const BuildingDatasetSchema = z.object({
  buildings: z.array(BuildingSchema),
  floors: z.array(FloorSchema),
  pois: z.array(PoiSchema).default([]),
  nodeTypes: z.array(NodeTypeSchema),
  edgeTypes: z.array(EdgeTypeSchema),
  nodes: z.array(RoutingNodeSchema),
  edges: z.array(RoutingEdgeSchema),
});
