import neo4j, { Driver } from "neo4j-driver";
import dotenv from 'dotenv';

dotenv.config();

/**
 * Creates the Neo4j driver from NEO4J_URI / NEO4J_USERNAME / NEO4J_PASSWORD.
 * Only called when the service runs against Neo4j, so the in-memory store
 * and the tests need no database settings.
 */
export function createDriver(): Driver {
    const URI = process.env.NEO4J_URI;
    const USER = process.env.NEO4J_USERNAME;
    const PASSWORD = process.env.NEO4J_PASSWORD;

    if (!URI || !USER || !PASSWORD) {
        throw new Error(".env missing fields: NEO4J_URI, NEO4J_USERNAME and NEO4J_PASSWORD are required");
    }

    return neo4j.driver(
        URI,
        neo4j.auth.basic(USER, PASSWORD),
        {
            logging: {
                level: 'warn',
                logger: (level, message) => console.log(`[Neo4j ${level}] ${message}`)
            }
        }
    );
}

// The server starts even without a database; readiness reports it.
export async function verifyConnection(driver: Driver): Promise<boolean> {
    try {
        const serverInfo = await driver.getServerInfo();
        console.log('Connected to Neo4j:', serverInfo.address, serverInfo.agent);
        return true;
    } catch (err) {
        console.error("\nCould not connect to Neo4j. Continuing without connection.", err instanceof Error ? err.message : err);
        return false;
    }
}
