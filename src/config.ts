import { z } from 'zod';
import { DEFAULT_NEARLY_FULL_THRESHOLD } from './domain/status';

const flag = (fallback: 'true' | 'false') => z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform(v => v === 'true' || v === '1');

/**
 * Environment variables read at start-up
 */
const EnvSchema = z.object({
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: flag('true'),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    NEARLY_FULL_THRESHOLD: z.coerce.number().int().positive().default(DEFAULT_NEARLY_FULL_THRESHOLD),
    MAX_PARTY_SIZE: z.coerce.number().int().positive().default(10),
    OPEN_BOOKING: flag('false'),
    VERIFY_BEFORE_COMMIT: flag('true'),
    LOCK_TTL_MS: z.coerce.number().int().positive().default(5000),
    STORE_FILE: z.string().min(1).optional(),
    SEED_FILE: z.string().min(1).default('data/seed.json'),
    ADMIN_TOKEN: z.string().min(1).optional(),
});

export interface AppConfig {
    host: string;
    port: number;
    logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    logPretty: boolean;
    rateLimitMax: number;
    /** Tables with fewer free seats than this show as NEARLY_FULL */
    nearlyFullThreshold: number;
    maxPartySize: number;
    /** Enables the ungated booking route */
    openBooking: boolean;
    /** Re-read the target table right before writing and refuse stale commits */
    verifyBeforeCommit: boolean;
    lockTtlMs: number;
    /** JSON store file; the in-memory store is used when unset */
    storeFile?: string;
    seedFile: string;
    /** Required in x-admin-token for the export when set */
    adminToken?: string;
}

/**
 * Parse configuration from the environment
 *
 * @throws {z.ZodError} when a variable is present but malformed
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = EnvSchema.parse(env);
    return {
        host: parsed.HOST,
        port: parsed.PORT,
        logLevel: parsed.LOG_LEVEL,
        logPretty: parsed.LOG_PRETTY,
        rateLimitMax: parsed.RATE_LIMIT_MAX,
        nearlyFullThreshold: parsed.NEARLY_FULL_THRESHOLD,
        maxPartySize: parsed.MAX_PARTY_SIZE,
        openBooking: parsed.OPEN_BOOKING,
        verifyBeforeCommit: parsed.VERIFY_BEFORE_COMMIT,
        lockTtlMs: parsed.LOCK_TTL_MS,
        storeFile: parsed.STORE_FILE,
        seedFile: parsed.SEED_FILE,
        adminToken: parsed.ADMIN_TOKEN,
    };
}
