import fastify, { type FastifyServerOptions } from "fastify";
import rateLimit from '@fastify/rate-limit';
import { createHandlers } from "./routes";
import { ReservationService } from "./services/reservations";
import { StoreUnavailableError } from "./store/errors";
import type { AppConfig } from "./config";
import type { TableStore } from "./types";

export interface BuildAppOptions {
    config: AppConfig;
    store: TableStore;
    /** Overrides the logger derived from config (tests pass false) */
    logger?: FastifyServerOptions['logger'];
}

const loggerFromConfig = (config: AppConfig): FastifyServerOptions['logger'] => {
    if (!config.logPretty) return { level: config.logLevel };
    return {
        level: config.logLevel,
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:dd-mm-yyyy HH:MM:ss"
            }
        }
    };
}

/**
 * Build the seating reservation server
 *
 * - Fastify with pino logging (pretty-printed unless LOG_PRETTY=false)
 * - Rate limiting (RATE_LIMIT_MAX requests per minute)
 * - Routes under the /seating prefix
 * - Store failures answered with 503
 */
export async function buildApp({ config, store, logger }: BuildAppOptions) {
    const app = fastify({ logger: logger ?? loggerFromConfig(config) });

    const service = new ReservationService(store, {
        nearlyFullThreshold: config.nearlyFullThreshold,
        verifyBeforeCommit: config.verifyBeforeCommit,
        lockTtlMs: config.lockTtlMs
    }, app.log);
    const handlers = createHandlers(service, config);

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof StoreUnavailableError) {
            request.log.error({ err: error }, 'table store unavailable');
            return reply.status(503).send({ error: 'store_unavailable', detail: 'Seating data is unavailable, try again later' });
        }

        const statusCode = error.statusCode ?? 500;
        if (statusCode >= 500) {
            request.log.error({ err: error }, 'request failed');
            return reply.status(500).send({ error: 'internal_error' });
        }
        return reply.status(statusCode).send({ error: 'request_error', detail: error.message });
    });

    await app.register(rateLimit, {
        max: config.rateLimitMax,
        timeWindow: '1 minute'
    });

    app.register(function (app, _, done) {
        app.post("/access", handlers.access);
        app.get("/tables", handlers.tables);
        app.post("/bookings", handlers.bookings);
        app.post("/bookings/open", handlers.openBookings);
        app.get("/map", handlers.map);
        app.get("/search", handlers.search);
        app.get("/export", handlers.exportCsv);

        done();
    }, { prefix: "/seating" });

    return app;
}
