import dotenv from 'dotenv';
import path from 'path';
import { Environment } from '../domain/models';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export const DEFAULT_BASE_URLS: Record<Environment, string> = {
    [Environment.Test]: 'http://api2.fraktjakt.se',
    [Environment.Production]: 'http://api1.fraktjakt.se',
};

export interface FraktjaktConfig {
    consignorId: string;
    consignorKey: string;   // test and production use different credentials
    currency: string;
    language: string;
    environment: Environment;
    baseUrls: Record<Environment, string>;
}

export interface DbConfig {
    connectionString: string;
    maxConnections?: number;
}

export interface AppConfig {
    nodeEnv: string;
    requestTimeoutMs: number;
    debug: boolean;
    fraktjakt: FraktjaktConfig;
    db?: DbConfig;
}

function readEnv(key: string, fallback?: string): string {
    const val = process.env[key] ?? fallback;
    if (val === undefined) {
        throw new Error(
            `Missing required environment variable: ${key}. ` +
            `Check your .env file or environment.`
        );
    }
    return val;
}

function readEnvironment(value: string): Environment {
    const normalized = value.trim().toLowerCase();
    if (normalized === Environment.Test || normalized === Environment.Production) {
        return normalized;
    }
    throw new Error(
        `FRAKTJAKT_ENVIRONMENT must be "test" or "production", got "${value}".`
    );
}

export function loadConfig(): AppConfig {
    const databaseUrl = process.env.DATABASE_URL;
    return {
        nodeEnv: readEnv('NODE_ENV', 'development'),
        requestTimeoutMs: parseInt(readEnv('REQUEST_TIMEOUT_MS', '15000'), 10),
        debug: readEnv('FRAKTJAKT_DEBUG', 'false') === 'true',
        fraktjakt: {
            consignorId: readEnv('FRAKTJAKT_CONSIGNOR_ID'),
            consignorKey: readEnv('FRAKTJAKT_CONSIGNOR_KEY'),
            currency: readEnv('FRAKTJAKT_CURRENCY', 'SEK'),
            language: readEnv('FRAKTJAKT_LANGUAGE', 'sv'),
            environment: readEnvironment(readEnv('FRAKTJAKT_ENVIRONMENT', Environment.Production)),
            baseUrls: {
                [Environment.Test]: readEnv('FRAKTJAKT_TEST_URL', DEFAULT_BASE_URLS[Environment.Test]),
                [Environment.Production]: readEnv('FRAKTJAKT_PRODUCTION_URL', DEFAULT_BASE_URLS[Environment.Production]),
            },
        },
        db: databaseUrl
            ? { connectionString: databaseUrl, maxConnections: parseInt(readEnv('DB_POOL_MAX', '2'), 10) }
            : undefined,
    };
}
