import { compareIds } from '../utils/compare';
import type { RoutingGraph } from './graphAssembler';
import type { FloorSpatialIndex } from './spatialIndex';

interface CacheEntry<T> {
  value: Promise<T>;
  floorIds: readonly string[];
  createdAt: number;
}

export interface RoutingCacheStats {
  graphs: number;
  spatialIndexes: number;
  hits: number;
  misses: number;
}

/**
 * Caches assembled graphs (keyed by floor set + accessibility flag) and
 * per-floor spatial indexes between queries.
 *
 * Invalidation contract: whoever changes a floor's routing nodes or edges
 * calls `invalidateFloor(floorId)`; that drops every graph containing the
 * floor and the floor's index. Entries also expire after `ttlMs`. A ttl of 0
 * disables caching and every call loads fresh data.
 */
export class RoutingCache {
  private readonly graphs = new Map<string, CacheEntry<RoutingGraph>>();
  private readonly indexes = new Map<string, CacheEntry<FloorSpatialIndex>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  getGraph(
    floorIds: readonly string[],
    accessibleOnly: boolean,
    load: () => Promise<RoutingGraph>,
  ): Promise<RoutingGraph> {
    const floors = [...new Set(floorIds)].sort(compareIds);
    const key = `${accessibleOnly ? 'accessible' : 'all'}:${floors.join(',')}`;
    return this.lookup(this.graphs, key, floors, load);
  }

  getSpatialIndex(
    floorId: string,
    load: () => Promise<FloorSpatialIndex>,
  ): Promise<FloorSpatialIndex> {
    return this.lookup(this.indexes, floorId, [floorId], load);
  }

  invalidateFloor(floorId: string): void {
    for (const [key, entry] of this.graphs) {
      if (entry.floorIds.includes(floorId)) this.graphs.delete(key);
    }
    this.indexes.delete(floorId);
  }

  clear(): void {
    this.graphs.clear();
    this.indexes.clear();
  }

  stats(): RoutingCacheStats {
    return {
      graphs: this.graphs.size,
      spatialIndexes: this.indexes.size,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private lookup<T>(
    entries: Map<string, CacheEntry<T>>,
    key: string,
    floorIds: readonly string[],
    load: () => Promise<T>,
  ): Promise<T> {
    if (!this.enabled) return load();

    const existing = entries.get(key);
    if (existing && this.now() - existing.createdAt < this.ttlMs) {
      this.hits++;
      return existing.value;
    }

    this.misses++;
    // Concurrent callers share the pending load
    const value = load();
    const entry: CacheEntry<T> = { value, floorIds, createdAt: this.now() };
    entries.set(key, entry);
    void value.catch(() => {
      // A failed load is not cached
      if (entries.get(key) === entry) entries.delete(key);
    });
    return value;
  }
}
