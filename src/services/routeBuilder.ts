// src/services/routeBuilder.ts
import type { RoutingConfig } from '../config/routing';
import type { Coordinates, Floor } from '../types/nodes';
import { roundTo } from '../utils/math';
import { generateInstructions } from '../utils/routing/generateInstructions';
import { groupPathByFloor, type FloorPath } from '../utils/routing/groupPathByFloor';
import { NoRouteError, NotFoundError } from './errors';
import { resolveFloorSet } from './floorSet';
import { assembleGraph, type RoutingGraph } from './graphAssembler';
import { solveShortestPath } from './pathSolver';
import { RoutingCache } from './routingCache';
import { FloorSpatialIndex, type NearestNode } from './spatialIndex';
import type { RoutingStore } from './store/types';

export interface RouteRequest {
  fromFloorId: string;
  from: Coordinates;
  toPoiId: string;
  /** Wheelchair-accessible edges only */
  accessible: boolean;
}

// the units of the distance is meters
export interface RouteResult {
  floors: FloorPath[]; // In order of the path.
  distance: number;
  steps: string[];
}

export type RouteBuilderConfig = Pick<
  RoutingConfig,
  'floorStrategy' | 'floorGrouping' | 'floorLabels' | 'spatialCellMeters' | 'distanceMarkerInterval'
>;

export interface RouteBuilderDeps {
  store: RoutingStore;
  config: RouteBuilderConfig;
  /** Optional; a disabled cache loads everything per query */
  cache?: RoutingCache;
}

/**
 * Computes a route from a coordinate on a floor to a POI.
 *
 * Throws NotFoundError when the POI or the origin floor is missing and
 * NoRouteError when either floor has no routing nodes or the graph does not
 * connect the two waypoints. Anything else is unexpected and propagates.
 */
export async function calculateRoute(
  deps: RouteBuilderDeps,
  request: RouteRequest,
): Promise<RouteResult> {
  const { store, config } = deps;
  const cache = deps.cache ?? new RoutingCache(0);
  const startedAt = Date.now();

  const poi = await store.getPoi(request.toPoiId);
  if (!poi) {
    throw new NotFoundError('Destination POI not found');
  }

  const originFloor = await store.getFloor(request.fromFloorId);
  if (!originFloor) {
    throw new NotFoundError('Floor not found');
  }

  const destinationFloor =
    poi.floorId === originFloor.id ? originFloor : await store.getFloor(poi.floorId);

  const [startNode, endNode] = await Promise.all([
    findNearestNode(deps, cache, originFloor.id, request.from),
    findNearestNode(deps, cache, poi.floorId, poi),
  ]);

  if (!startNode || !endNode) {
    throw new NoRouteError('Could not find routing nodes near start or destination');
  }

  const floorIds = await resolveFloorSet(
    store,
    {
      originFloorId: originFloor.id,
      destinationFloorId: poi.floorId,
      buildingId: originFloor.buildingId,
    },
    config.floorStrategy,
  );

  const graph = await cache.getGraph(floorIds, request.accessible, () =>
    assembleGraph(store, floorIds, { accessibleOnly: request.accessible }),
  );

  if (!graph.hasVertex(startNode.node.id) || !graph.hasVertex(endNode.node.id)) {
    throw new NoRouteError();
  }

  const solved = solveShortestPath(graph, startNode.node.id, endNode.node.id);
  if (!solved) {
    throw new NoRouteError();
  }

  const floorNames = await floorLabels(store, config, graph, [originFloor, destinationFloor]);

  const result: RouteResult = {
    floors: groupPathByFloor(graph, solved.path, config.floorGrouping),
    distance: roundTo(solved.distance, 2),
    steps: generateInstructions(graph, solved.path, {
      markerInterval: config.distanceMarkerInterval,
      floorLabel: floorNames ? (floorId) => floorNames.get(floorId) ?? floorId : undefined,
    }),
  };

  console.log(
    `[route] ${request.fromFloorId} -> poi ${request.toPoiId} ` +
      `(${solved.path.length} nodes, ${result.distance}m, floors ${floorIds.join(',')}, ` +
      `accessible=${request.accessible}) in ${Date.now() - startedAt}ms`,
  );

  return result;
}

/**
 * Nearest routing node on a floor, or null when the floor has none.
 */
export async function findNearestNode(
  deps: RouteBuilderDeps,
  cache: RoutingCache,
  floorId: string,
  coords: Coordinates,
): Promise<NearestNode | null> {
  const index = await cache.getSpatialIndex(floorId, async () =>
    FloorSpatialIndex.build(
      floorId,
      await deps.store.listNodesByFloors([floorId]),
      deps.config.spatialCellMeters,
    ),
  );
  return index.nearest(coords);
}

async function floorLabels(
  store: RoutingStore,
  config: RouteBuilderConfig,
  graph: RoutingGraph,
  known: (Floor | null)[],
): Promise<Map<string, string> | null> {
  if (config.floorLabels !== 'name') return null;

  const names = new Map<string, string>();
  for (const floor of known) {
    if (floor) names.set(floor.id, floor.name);
  }
  for (const floorId of graph.floorIds()) {
    if (names.has(floorId)) continue;
    const floor = await store.getFloor(floorId);
    if (floor) names.set(floor.id, floor.name);
  }
  return names;
}
