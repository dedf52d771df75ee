/**
 * src/utils/db.ts
 *
 * PostgreSQL access for both pipeline cycles.
 *
 * Nothing here is a module-level singleton: each entry point builds one
 * Datastore from its validated config and passes it down. Every unit of work
 * goes through `withSession()`, which acquires a connection under the retry
 * policy and always releases it, and optionally `withTransaction()`.
 *
 * The pool is lazy — it does NOT connect until the first session is opened.
 */

import pkg from 'pg';
import type { Pool as PgPool, PoolClient } from 'pg';
import { log } from 'crawlee';
import type { z } from 'zod';
import { StoreUnavailable } from '../errors.js';
import { isTransientConnectionError, withRetry, type RetryPolicy } from './retry.js';

const { Pool } = pkg;

// ─── Capability ───────────────────────────────────────────────────────────────

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
    rows: SqlRow[];
    rowCount: number | null;
}

export interface DatastoreSession {
    query(sql: string, values?: unknown[]): Promise<SqlResult>;
    /** Pass the failure when the connection should not go back to the pool. */
    release(err?: Error): void;
}

export interface Datastore {
    connect(): Promise<DatastoreSession>;
    end(): Promise<void>;
}

/** SQLSTATE 42P01: the table has not been created yet. */
export function isUndefinedTable(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === '42P01';
}

/** Validate driver rows against the shape a query selects. */
export function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: SqlRow[]): T[] {
    return rows.map((row) => schema.parse(row));
}

// ─── pg adapter ───────────────────────────────────────────────────────────────

export interface DatabaseConfig {
    connectionString?: string;
    host: string;
    port: number;
    user?: string;
    password?: string;
    database: string;
    ssl: boolean;
    poolMax: number;
    connectTimeoutMs: number;
    statementTimeoutMs: number;
}

class PgSession implements DatastoreSession {
    constructor(private readonly client: PoolClient) {}

    async query(sql: string, values?: unknown[]): Promise<SqlResult> {
        const result = await this.client.query(sql, values);
        return { rows: result.rows, rowCount: result.rowCount };
    }

    release(err?: Error): void {
        this.client.release(err);
    }
}

export class PgDatastore implements Datastore {
    private readonly pool: PgPool;

    constructor(config: DatabaseConfig) {
        const ssl = config.ssl || config.connectionString?.includes('sslmode=require')
            ? { rejectUnauthorized: false }
            : undefined;
        const common = {
            ssl,
            max: config.poolMax,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: config.connectTimeoutMs,
            statement_timeout: config.statementTimeoutMs,
            query_timeout: config.statementTimeoutMs + 5_000,
        };

        this.pool = new Pool(
            config.connectionString
                ? { connectionString: config.connectionString, ...common }
                : {
                    host: config.host,
                    port: config.port,
                    user: config.user,
                    password: config.password,
                    database: config.database,
                    ...common,
                }
        );

        // Idle clients can error when the server restarts; the next acquisition retries.
        this.pool.on('error', (err) => {
            log.warning(`[DB] Idle client error: ${err.message}`);
        });
    }

    async connect(): Promise<DatastoreSession> {
        const client = await this.pool.connect();
        return new PgSession(client);
    }

    async end(): Promise<void> {
        await this.pool.end();
    }
}

// ─── Scoped acquisition ───────────────────────────────────────────────────────

/**
 * Acquire a session (retrying transient connection failures), run `work`,
 * release on every exit path. A connection that drops while `work` runs
 * surfaces as StoreUnavailable.
 */
export async function withSession<T>(
    store: Datastore,
    policy: RetryPolicy,
    operation: string,
    work: (session: DatastoreSession) => Promise<T>
): Promise<T> {
    const session = await withRetry(() => store.connect(), { ...policy, operation: `${operation} (connect)` });

    try {
        const result = await work(session);
        session.release();
        return result;
    } catch (err) {
        const broken = isTransientConnectionError(err);
        session.release(broken && err instanceof Error ? err : undefined);
        if (broken) throw StoreUnavailable.connectionLost(operation, err);
        throw err;
    }
}

/**
 * BEGIN / COMMIT around `work`; ROLLBACK on any failure, then rethrow the
 * original error.
 */
export async function withTransaction<T>(
    session: DatastoreSession,
    work: (session: DatastoreSession) => Promise<T>
): Promise<T> {
    await session.query('BEGIN');
    try {
        const result = await work(session);
        await session.query('COMMIT');
        return result;
    } catch (err) {
        try {
            await session.query('ROLLBACK');
        } catch (rollbackErr) {
            const reason = rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr);
            log.warning(`[DB] ROLLBACK failed: ${reason}`);
        }
        throw err;
    }
}

/**
 * Quick connectivity smoke-test. Returns true if the DB is reachable.
 */
export async function pingDb(store: Datastore, policy: RetryPolicy): Promise<boolean> {
    try {
        await withSession(store, policy, 'ping', (session) => session.query('SELECT 1'));
        return true;
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        log.debug(`[DB] Ping failed: ${reason}`);
        return false;
    }
}
