import { z, ZodError } from 'zod';
import * as path from 'path';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveInt = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int().positive());

const timeZone = z.string().refine((zone) => {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: zone });
        return true;
    } catch {
        return false;
    }
}, { message: 'Unknown IANA time zone' });

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF'] as const;

const logLevel = z.preprocess(
    (v) => (typeof v === 'string' && v.trim() ? v.trim().toUpperCase() : undefined),
    z.enum(LOG_LEVELS),
);

export const envSchema = z.object({
    DATABASE_URL: z.string().optional(),
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    PGDATABASE: z.string().default('etl_db'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: positiveInt.default(5),

    DB_RETRY_MAX_ATTEMPTS: positiveInt.default(5),
    DB_RETRY_BASE_DELAY_MS: numFromEnv.pipe(z.number().min(0)).default(1000),
    DB_CONNECT_TIMEOUT_MS: positiveInt.default(5000),
    DB_STATEMENT_TIMEOUT_MS: positiveInt.default(30_000),

    AIRPORT_CODE: z.string().trim().min(1).default('chopin'),
    AIRPORT_TIMEZONE: timeZone.default('Europe/Warsaw'),
    LISTING_URL: z.string().url().default('https://www.lotnisko-chopina.pl/pl/odloty.html'),

    PAGE_READY_TIMEOUT_MS: positiveInt.default(30_000),
    REVEAL_SETTLE_TIMEOUT_MS: positiveInt.default(8_000),
    RUN_BUDGET_MS: positiveInt.default(180_000),
    MAX_REVEAL_ITERATIONS: positiveInt.default(200),
    NAVIGATION_RETRIES: numFromEnv.pipe(z.number().int().min(0)).default(2),
    HEADLESS: boolUnlessFalse.default(true),
    CHROME_USER_AGENT: z.string().optional(),
    DEBUG_DIR: z.string().default(path.join(process.cwd(), 'storage')),

    TOP_N: positiveInt.default(10),
    EXTRACT_INTERVAL_MINUTES: numFromEnv.pipe(z.number().positive()).default(60),
    AGGREGATE_INTERVAL_MINUTES: numFromEnv.pipe(z.number().positive()).default(5),

    CRAWLEE_LOG_LEVEL: logLevel.default('INFO'),
    LOG_FILE: z.string().optional(),
}).passthrough();

export type Env = z.infer<typeof envSchema>;

/** DB_HOST / DB_PORT / DB_USER / DB_PASS / DB_NAME fill in unset PG* variables. */
function withDbAliases(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const next: NodeJS.ProcessEnv = {};
    for (const [key, value] of Object.entries(raw)) {
        // Blank assignments in .env files mean "use the default".
        if (value !== undefined && value.trim() !== '') next[key] = value;
    }
    if (!next.PGHOST && next.DB_HOST) next.PGHOST = next.DB_HOST;
    if (!next.PGPORT && next.DB_PORT) next.PGPORT = next.DB_PORT;
    if (!next.PGUSER && next.DB_USER) next.PGUSER = next.DB_USER;
    if (!next.PGPASSWORD && next.DB_PASSWORD) next.PGPASSWORD = next.DB_PASSWORD;
    if (!next.PGPASSWORD && next.DB_PASS) next.PGPASSWORD = next.DB_PASS;
    if (!next.PGDATABASE && next.DB_NAME) next.PGDATABASE = next.DB_NAME;
    return next;
}

/**
 * Validates a raw environment. Throws a single Error listing every invalid
 * variable, one per line.
 */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(withDbAliases(raw));
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new Error('Invalid environment variables:\n' + lines.join('\n'));
        }
        throw err;
    }
}
