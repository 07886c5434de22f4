import dotenv from 'dotenv';
import {
  parseBooleanEnv,
  parseListEnv,
  parseTrustProxy,
  readEnumEnv,
  readNonNegativeIntEnv,
  readPositiveIntEnv,
  type TrustProxySetting,
} from '../utils/httpConfig';

dotenv.config();

// Which floors get loaded for a query
export const FLOOR_STRATEGIES = ['endpoints', 'connected'] as const;
export type FloorStrategy = (typeof FLOOR_STRATEGIES)[number];

// How a path that revisits a floor is grouped in the response
export const FLOOR_GROUPINGS = ['merge', 'split'] as const;
export type FloorGrouping = (typeof FLOOR_GROUPINGS)[number];

export const FLOOR_LABEL_MODES = ['id', 'name'] as const;
export type FloorLabelMode = (typeof FLOOR_LABEL_MODES)[number];

export const STORE_DRIVERS = ['neo4j', 'memory'] as const;
export type StoreDriver = (typeof STORE_DRIVERS)[number];

export interface RoutingConfig {
  floorStrategy: FloorStrategy;
  floorGrouping: FloorGrouping;
  floorLabels: FloorLabelMode;
  cacheTtlMs: number; // 0 disables the routing cache
  spatialCellMeters: number;
  timeoutMs: number;
  distanceMarkerInterval: number; // emit a distance step every N path vertices
}

export interface ServerConfig {
  port: number;
  store: StoreDriver;
  dataFile: string;
  neo4jDatabase: string;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  trustProxy: TrustProxySetting;
  corsOrigins: string[];
  isProduction: boolean;
  exposeDocs: boolean;
}

export function loadRoutingConfig(): RoutingConfig {
  return {
    floorStrategy: readEnumEnv('ROUTE_FLOOR_STRATEGY', FLOOR_STRATEGIES, 'endpoints'),
    floorGrouping: readEnumEnv('ROUTE_FLOOR_GROUPING', FLOOR_GROUPINGS, 'merge'),
    floorLabels: readEnumEnv('ROUTE_FLOOR_LABELS', FLOOR_LABEL_MODES, 'id'),
    cacheTtlMs: readNonNegativeIntEnv('ROUTING_CACHE_TTL_MS', 0),
    spatialCellMeters: readPositiveIntEnv('SPATIAL_CELL_METERS', 10),
    timeoutMs: readPositiveIntEnv('ROUTE_TIMEOUT_MS', 10_000),
    distanceMarkerInterval: 5,
  };
}

export function loadServerConfig(): ServerConfig {
  const isProduction = (process.env.NODE_ENV ?? '').toLowerCase() === 'production';
  return {
    port: readPositiveIntEnv('PORT', 3000),
    store: readEnumEnv('ROUTING_STORE', STORE_DRIVERS, 'neo4j'),
    dataFile: process.env.ROUTING_DATA_FILE ?? './data/sample-building.json',
    neo4jDatabase: process.env.NEO4J_DATABASE ?? 'neo4j',
    rateLimitWindowMs: readPositiveIntEnv('API_RATE_LIMIT_WINDOW_MS', 60_000),
    rateLimitMax: readPositiveIntEnv('API_RATE_LIMIT_MAX', 100),
    trustProxy: parseTrustProxy(process.env.TRUST_PROXY),
    corsOrigins: parseListEnv('CORS_ORIGINS', ['*']),
    isProduction,
    exposeDocs: parseBooleanEnv('API_DOCS_ENABLED', !isProduction),
  };
}

export const ROUTING_CONFIG: RoutingConfig = loadRoutingConfig();
