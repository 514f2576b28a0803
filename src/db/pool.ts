import { Pool, PoolConfig } from 'pg';
import { DbConfig } from '../config';
import { Logger, createConsoleLogger, errorToLog } from '../logging/logger';

export const DEFAULT_MAX_CONNECTIONS = 2;

export function createPool(config: DbConfig, logger: Logger = createConsoleLogger({ prefix: 'db' })): Pool {
    const poolConfig: PoolConfig = {
        connectionString: config.connectionString,
        application_name: 'fraktjakt-client',
        max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
        idleTimeoutMillis: 10_000,
        connectionTimeoutMillis: 5000,
        allowExitOnIdle: true,   // idle clients do not hold the process open
    };

    const pool = new Pool(poolConfig);
    pool.on('error', (err) => {
        logger.error('Operation log connection failed', errorToLog(err));
    });

    return pool;
}

export async function closePool(pool: Pool): Promise<void> {
    await pool.end();
}
