/**
 * Connection factories for Postgres and Redis.
 * Postgres holds every durable record; Redis only carries leader election
 * and notifications.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

const TAG = '[db]';

/**
 * Postgres connection pool:
 * - max: 20 connections (suitable for moderate load)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    const pool = new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    // An idle client error means the connection is gone; the next checkout reconnects.
    pool.on('error', (err) => console.error(`${TAG} idle client error:`, err));
    return pool;
}

export function createRedis(url: string): Redis {
    const redis = new Redis(url, { maxRetriesPerRequest: 3 });
    redis.on('error', (err) => console.error(`${TAG} redis error:`, err));
    return redis;
}

/** What the repositories need from a pool; tests hand in a jest-mocked one. */
export type Queryable = Pick<Pool, 'query'>;
export type ConnectionPool = Pick<Pool, 'query' | 'connect'>;
