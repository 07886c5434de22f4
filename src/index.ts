import { createApp } from './app';
import { loadServerConfig, ROUTING_CONFIG, type ServerConfig } from './config/routing';
import { createDriver, verifyConnection } from './controller/db';
import { RoutingCache } from './services/routingCache';
import { InMemoryRoutingStore } from './services/store/memoryStore';
import { Neo4jRoutingStore } from './services/store/neo4jStore';
import type { RoutingStore } from './services/store/types';

async function openStore(config: ServerConfig): Promise<RoutingStore> {
  if (config.store === 'memory') {
    const store = await InMemoryRoutingStore.fromFile(config.dataFile);
    console.log(`[store] Loaded in-memory dataset from ${config.dataFile}`);
    return store;
  }

  const driver = createDriver();
  // starts regardless of db connection; /health/ready reports it
  await verifyConnection(driver);
  return new Neo4jRoutingStore(driver, config.neo4jDatabase);
}

async function main(): Promise<void> {
  const server = loadServerConfig();
  const store = await openStore(server);
  const cache = new RoutingCache(ROUTING_CONFIG.cacheTtlMs);

  console.log(
    `[config] store=${server.store} floorStrategy=${ROUTING_CONFIG.floorStrategy} ` +
      `grouping=${ROUTING_CONFIG.floorGrouping} cacheTtlMs=${ROUTING_CONFIG.cacheTtlMs}`,
  );

  const app = createApp({
    store,
    cache,
    routing: ROUTING_CONFIG,
    server,
    version: process.env.npm_package_version,
  });

  const httpServer = app.listen(server.port, () => {
    console.log(`Server running on http://localhost:${server.port}`);
  });

  // close the store when the app is interrupted
  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    httpServer.close();
    void store
      .close()
      .catch((err: unknown) => {
        console.error('[store] Failed to close cleanly:', err instanceof Error ? err.message : err);
      })
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('[server] Failed to start:', err);
  process.exit(1);
});
