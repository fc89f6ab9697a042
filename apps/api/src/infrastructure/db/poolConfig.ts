import type { PoolConfig } from 'pg';
import { searchConfig } from '../../application/config/searchConfig';

/**
 * Pool settings for the retrieval database. Waiting for a free connection
 * counts against the search budget, so the acquisition timeout stays below it.
 */
export function readPoolConfig(
    env: NodeJS.ProcessEnv = process.env,
    searchTimeoutMs: number = searchConfig.searchTimeoutMs
): PoolConfig {
    const ceiling = Math.max(1, searchTimeoutMs - 1);
    const requested = parseInt(env.DB_CONNECTION_TIMEOUT_MS || '', 10);
    const connectionTimeoutMillis = Number.isInteger(requested) && requested > 0
        ? Math.min(requested, ceiling)
        : Math.max(1, Math.floor(searchTimeoutMs / 2));

    return {
        connectionString: env.DATABASE_URL,
        min: 5,
        max: parseInt(env.DB_POOL_MAX || '20', 10),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis,
    };
}
