import type * as types from "../types";

/**
 * In-memory Table Store
 *
 * Features:
 * - Holds the `Tables` and `Students` collections in process
 * - Reads hand out deep copies, so callers can never mutate stored rows
 * - Writes replace a whole collection, like the spreadsheet it stands in for
 *
 * Note: state is lost on restart. Use the JSON file store to keep bookings.
 */
export class MemoryTableStore implements types.TableStore {
    private collections: types.StoreCollections = { Tables: [], Students: [] };

    /**
     * @param seed - Optional initial data to populate store
     */
    constructor(seed?: Partial<types.StoreCollections>) {
        if (seed) {
            this.loadSeed(seed);
        }
    }

    /**
     * Load seed data into the store, replacing the collections it names
     */
    loadSeed(seed: Partial<types.StoreCollections>) {
        if (seed.Tables) this.collections.Tables = structuredClone(seed.Tables);
        if (seed.Students) this.collections.Students = structuredClone(seed.Students);
    }

    async read<C extends types.CollectionName>(collection: C): Promise<types.StoreCollections[C]> {
        return structuredClone(this.collections[collection]);
    }

    async replace<C extends types.CollectionName>(collection: C, rows: types.StoreCollections[C]): Promise<void> {
        this.collections[collection] = structuredClone(rows);
    }
}
