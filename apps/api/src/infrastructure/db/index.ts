import 'dotenv/config';
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as schema from "./schema";
import logger from '../logger';
import { readPoolConfig } from './poolConfig';

const poolConfig = readPoolConfig();
if (!poolConfig.connectionString) {
    throw new Error("DATABASE_URL environment variable is not set");
}

const pool = new Pool(poolConfig);

pool.on('error', (err) => {
    logger.error('Unexpected database pool error', { error: err.message });
});

pool.on('connect', () => {
    logger.debug('New database connection established');
});

pool.on('remove', () => {
    logger.debug('Database connection removed from pool');
});

export const db = drizzle(pool, { schema });

export type Database = typeof db;
export type DatabaseTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];

export async function closeDatabase(): Promise<void> {
    await pool.end();
}
