import 'dotenv/config';
import { parseEnv, type Env } from './envSchema.js';

let env: Env;
try {
    env = parseEnv(process.env);
} catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}

export { env };
export type { Env };
