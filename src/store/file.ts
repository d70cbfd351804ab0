import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import type * as types from "../types";
import { StoreDocumentSchema } from '../schemas';
import { StoreUnavailableError } from './errors';

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Parse and validate a store document
 *
 * @throws {StoreUnavailableError} when the text is not JSON or a row is malformed
 */
export const parseStoreDocument = (text: string, source: string): types.StoreCollections => {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new StoreUnavailableError(`${source} is not valid JSON`, { cause: error });
    }

    const parsed = StoreDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        throw new StoreUnavailableError(`${source} has malformed rows: ${parsed.error.message}`, { cause: parsed.error });
    }
    return parsed.data;
}

/**
 * Table Store kept in a single JSON document on disk
 *
 * Document shape: { "Tables": [...], "Students": [...] }
 *
 * - Rows are validated on every read; numeric access codes become strings
 * - A missing file reads as the fallback collections (usually the seed)
 * - replace() rewrites the whole document through a temp file and rename
 *
 * There is no locking: two processes writing the same file can still lose an update.
 */
export class JsonFileTableStore implements types.TableStore {
    constructor(
        private readonly filePath: string,
        private readonly fallback: types.StoreCollections = { Tables: [], Students: [] }
    ) { }

    private async load(): Promise<types.StoreCollections> {
        let text: string;
        try {
            text = await readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return structuredClone(this.fallback);
            throw new StoreUnavailableError(`Cannot read ${this.filePath}`, { cause: error });
        }
        return parseStoreDocument(text, this.filePath);
    }

    async read<C extends types.CollectionName>(collection: C): Promise<types.StoreCollections[C]> {
        const document = await this.load();
        return document[collection];
    }

    async replace<C extends types.CollectionName>(collection: C, rows: types.StoreCollections[C]): Promise<void> {
        const document = await this.load();
        document[collection] = rows;

        const tmpPath = `${this.filePath}.${process.pid}.tmp`;
        try {
            await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
            await rename(tmpPath, this.filePath);
        } catch (error) {
            await rm(tmpPath, { force: true });
            throw new StoreUnavailableError(`Cannot write ${this.filePath}`, { cause: error });
        }
    }
}

/**
 * Read a seed file in the store document format
 */
export const loadSeedFile = async (filePath: string): Promise<types.StoreCollections> => {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        throw new StoreUnavailableError(`Cannot read seed file ${filePath}`, { cause: error });
    }
    return parseStoreDocument(text, filePath);
}
