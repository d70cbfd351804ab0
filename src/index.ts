/**
 * Seating Reservation Server
 *
 * Main entry point. Loads configuration from the environment, opens the
 * Table Store and starts the Fastify server.
 *
 * - STORE_FILE set: bookings persist in that JSON file, seeded from SEED_FILE while it does not exist
 * - STORE_FILE unset: in-memory store seeded from SEED_FILE, reset on restart
 */

import { buildApp } from "./app";
import { loadConfig } from "./config";
import { MemoryTableStore } from "./store/db";
import { JsonFileTableStore, loadSeedFile } from "./store/file";
import type { TableStore } from "./types";

const main = async () => {
    const config = loadConfig();
    const seed = await loadSeedFile(config.seedFile);

    const store: TableStore = config.storeFile
        ? new JsonFileTableStore(config.storeFile, seed)
        : new MemoryTableStore(seed);

    const app = await buildApp({ config, store });
    app.log.info({ store: config.storeFile ?? 'memory', openBooking: config.openBooking }, 'table store ready');

    await app.listen({ host: config.host, port: config.port });
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
