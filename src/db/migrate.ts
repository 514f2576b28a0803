import { loadConfig } from '../config';
import { createConsoleLogger, errorToLog } from '../logging/logger';
import { createPool, closePool } from './pool';

const logger = createConsoleLogger({ prefix: 'migrate' });

export const MIGRATIONS = [
    {
        name: '001_create_operation_log',
        sql: `
      CREATE TABLE IF NOT EXISTS operation_log (
        id           SERIAL PRIMARY KEY,
        request_id   VARCHAR(64) NOT NULL,
        operation    VARCHAR(16) NOT NULL,
        environment  VARCHAR(16) NOT NULL,
        status       VARCHAR(16) NOT NULL,
        duration_ms  INTEGER,
        shipment_id  BIGINT,
        error_code   VARCHAR(32),
        error_msg    TEXT,
        created_at   TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_operation_log_request_id
        ON operation_log(request_id);
    `,
    },
];

async function runMigrations() {
    const config = loadConfig();
    if (!config.db) {
        logger.error('DATABASE_URL is not set, nothing to migrate');
        process.exit(1);
    }
    const pool = createPool(config.db, logger);

    logger.info('Running database migrations...');

    for (const migration of MIGRATIONS) {
        try {
            await pool.query(migration.sql);
            logger.info(`✓ ${migration.name}`);
        } catch (err) {
            logger.error(`✗ ${migration.name} failed`, errorToLog(err));
            process.exit(1);
        }
    }

    logger.info('All migrations complete.');
    await closePool(pool);
}

if (require.main === module) {
    runMigrations().catch((err) => {
        logger.error('Fatal error', errorToLog(err));
        process.exit(1);
    });
}
