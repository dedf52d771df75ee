/**
 * src/db/migrate.ts
 *
 * Idempotent schema setup for the raw log and the derived tables.
 *
 * Run:  npm run db:migrate
 *
 * Every statement is CREATE … IF NOT EXISTS, so running it twice changes
 * nothing. The extraction and aggregation cycles also create their own
 * tables on first use; this is for provisioning ahead of time.
 */

import { env } from '../config/env.js';
import { databaseConfig, retryPolicy } from '../config/pipeline.js';
import { PgDatastore, pingDb, withSession } from '../utils/db.js';
import { MIGRATIONS } from './schema.js';

async function migrate(): Promise<void> {
    const store = new PgDatastore(databaseConfig(env));
    const policy = retryPolicy(env);

    try {
        console.log('[migrate] Checking database connectivity…');
        const alive = await pingDb(store, policy);
        if (!alive) {
            console.error('[migrate] ✗ Cannot reach PostgreSQL. Check PGHOST / PGUSER / PGPASSWORD / PGDATABASE in .env');
            console.error('[migrate]   Current PGDATABASE:', env.PGDATABASE);
            process.exitCode = 1;
            return;
        }
        console.log(`[migrate] ✓ Connected to "${env.PGDATABASE}".`);

        await withSession(store, policy, 'migrate', async (session) => {
            for (const statement of MIGRATIONS) {
                await session.query(statement);
            }
        });
        console.log(`[migrate] ✓ ${MIGRATIONS.length} statements applied.`);
        console.log('[migrate] Done. Database is ready for both cycles.');
    } finally {
        await store.end();
    }
}

migrate().catch((err) => {
    console.error('[migrate] Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
