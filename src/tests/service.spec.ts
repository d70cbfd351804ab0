import { describe, it, expect } from 'vitest';
import { formatISO } from 'date-fns';
import { ReservationService } from '../services/reservations';
import { MemoryTableStore } from '../store/db';
import { StoreUnavailableError } from '../store/errors';
import type { CollectionName, SeatingTable, StoreCollections, TableStore } from '../types';
import { seedData } from './seed-data';

const BOOKED_AT = new Date('2026-05-30T18:00:00.000Z');

const createService = (store: TableStore, verifyBeforeCommit: boolean = true) =>
    new ReservationService(store, { nearlyFullThreshold: 3, verifyBeforeCommit, now: () => BOOKED_AT });

/**
 * Store that lets another writer change `Tables` right before the second read,
 * i.e. between the booking snapshot and the commit re-check
 */
class RacingStore extends MemoryTableStore {
    private tableReads = 0;

    constructor(seed: StoreCollections, private readonly interleave: (tables: SeatingTable[]) => SeatingTable[]) {
        super(seed);
    }

    async read<C extends CollectionName>(collection: C): Promise<StoreCollections[C]> {
        if (collection === 'Tables') {
            this.tableReads += 1;
            if (this.tableReads === 2) {
                await super.replace('Tables', this.interleave(await super.read('Tables')));
            }
        }
        return super.read(collection);
    }
}

describe('ReservationService', () => {
    describe('checkAccess', () => {
        it('should report a pending gate for an empty code', async () => {
            const service = createService(new MemoryTableStore(seedData));
            expect(await service.checkAccess('Lee', 'Sam', '')).toEqual({ ok: true, value: { status: 'PENDING' } });
        });

        it('should grant access and report an existing seat', async () => {
            const service = createService(new MemoryTableStore(seedData));
            expect(await service.checkAccess('Doe', 'Jane', '1111')).toEqual({
                ok: true,
                value: { status: 'GRANTED', student: { fullName: 'Jane Doe', ticketAllotment: 8 }, seatedAt: 'T1' }
            });
        });

        it('should deny a wrong code', async () => {
            const service = createService(new MemoryTableStore(seedData));
            expect(await service.checkAccess('Lee', 'Sam', '0000')).toEqual({ ok: false, error: { code: 'ACCESS_DENIED' } });
        });
    });

    it('should list tables that fit the party', async () => {
        const service = createService(new MemoryTableStore(seedData));
        expect(await service.listCandidates(4)).toEqual({
            ok: true,
            value: [
                { id: 'T2', capacity: 6, taken: 0, remaining: 6 },
                { id: 'T3', capacity: 10, taken: 5, remaining: 5 }
            ]
        });
    });

    describe('bookStudent', () => {
        it('should book the ticket allotment and write the table back', async () => {
            const store = new MemoryTableStore(seedData);
            const service = createService(store);

            const result = await service.bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '4521', tableId: 'T2' });

            expect(result).toEqual({
                ok: true,
                value: { tableId: 'T2', fullName: 'Sam Lee', partySize: 2, taken: 2, remaining: 4, bookedAt: formatISO(BOOKED_AT) }
            });
            const tables = await store.read('Tables');
            expect(tables).toEqual([
                seedData.Tables[0],
                { id: 'T2', capacity: 6, taken: 2, guestList: 'Sam Lee (2)', x: 2, y: 1 },
                seedData.Tables[2],
                seedData.Tables[3]
            ]);
        });

        it('should accept a code stored with a decimal suffix', async () => {
            const store = new MemoryTableStore(seedData);
            const result = await createService(store)
                .bookStudent({ lastName: 'Lee', firstName: 'Ann', accessCode: '7788', tableId: 'T3' });

            expect(result.ok && result.value.taken).toBe(9);
            const tables = await store.read('Tables');
            expect(tables[2]?.guestList).toBe('Ann Lee-Smith (5), Ann Lee (4)');
        });

        it('should ask for a code instead of denying an empty one', async () => {
            const store = new MemoryTableStore(seedData);
            const result = await createService(store)
                .bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '', tableId: 'T2' });

            expect(result).toEqual({ ok: false, error: { code: 'ACCESS_CODE_REQUIRED' } });
            expect(await store.read('Tables')).toEqual(seedData.Tables);
        });

        it('should deny a wrong code without writing', async () => {
            const store = new MemoryTableStore(seedData);
            const result = await createService(store)
                .bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '4520', tableId: 'T2' });

            expect(result).toEqual({ ok: false, error: { code: 'ACCESS_DENIED' } });
            expect(await store.read('Tables')).toEqual(seedData.Tables);
        });

        it('should refuse a student who already has a seat', async () => {
            const result = await createService(new MemoryTableStore(seedData))
                .bookStudent({ lastName: 'Doe', firstName: 'Jane', accessCode: '1111', tableId: 'T2' });
            expect(result).toEqual({ ok: false, error: { code: 'ALREADY_SEATED', tableId: 'T1' } });
        });

        it('should report no capacity for an allotment no table fits', async () => {
            const result = await createService(new MemoryTableStore(seedData))
                .bookStudent({ lastName: 'Ng', firstName: 'Tess', accessCode: '5050', tableId: 'T2' });
            expect(result).toEqual({ ok: false, error: { code: 'NO_CAPACITY', partySize: 7 } });
        });

        it('should surface unknown and ambiguous names', async () => {
            const service = createService(new MemoryTableStore(seedData));
            expect(await service.bookStudent({ lastName: 'Nobody', firstName: 'Sam', accessCode: '1', tableId: 'T2' }))
                .toEqual({ ok: false, error: { code: 'NOT_FOUND' } });
            expect(await service.bookStudent({ lastName: 'Kim', firstName: 'Robin', accessCode: '3030', tableId: 'T2' }))
                .toEqual({ ok: false, error: { code: 'AMBIGUOUS_RECORD', matches: 2 } });
        });
    });

    describe('commit re-check', () => {
        it('should refuse a table that filled up after the snapshot', async () => {
            const store = new RacingStore(seedData, tables => tables.map(t => t.id === 'T2'
                ? { ...t, taken: 6, guestList: 'Other Guest (6)' }
                : t));

            const result = await createService(store)
                .bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '4521', tableId: 'T2' });

            expect(result).toEqual({ ok: false, error: { code: 'STALE_SELECTION', tableId: 'T2' } });
            const tables = await store.read('Tables');
            expect(tables[1]).toEqual({ id: 'T2', capacity: 6, taken: 6, guestList: 'Other Guest (6)', x: 2, y: 1 });
        });

        it('should refuse a guest seated at another table after the snapshot', async () => {
            const store = new RacingStore(seedData, tables => tables.map(t => t.id === 'T3'
                ? { ...t, taken: 7, guestList: 'Ann Lee-Smith (5), Sam Lee (2)' }
                : t));

            const result = await createService(store)
                .bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '4521', tableId: 'T2' });

            expect(result).toEqual({ ok: false, error: { code: 'ALREADY_SEATED', tableId: 'T3' } });
            const tables = await store.read('Tables');
            expect(tables.map(t => t.guestList)).toEqual(['Jane Doe (8)', '', 'Ann Lee-Smith (5), Sam Lee (2)', 'Max Park (2)']);
        });

        it('should keep concurrent edits to other tables', async () => {
            const store = new RacingStore(seedData, tables => tables.map(t => t.id === 'T4'
                ? { ...t, taken: 4, guestList: 'Max Park (2), Kit Ro (2)' }
                : t));

            const result = await createService(store)
                .bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '4521', tableId: 'T2' });

            expect(result.ok).toBe(true);
            const tables = await store.read('Tables');
            expect(tables[1]?.guestList).toBe('Sam Lee (2)');
            expect(tables[3]).toEqual({ id: 'T4', capacity: 4, taken: 4, guestList: 'Max Park (2), Kit Ro (2)', x: 4, y: 1 });
        });
    });

    it('should turn away a booking while another one is committing', async () => {
        const service = createService(new MemoryTableStore(seedData));

        const [first, second] = await Promise.all([
            service.bookStudent({ lastName: 'Lee', firstName: 'Sam', accessCode: '4521', tableId: 'T2' }),
            service.bookStudent({ lastName: 'Lee', firstName: 'Ann', accessCode: '7788', tableId: 'T3' })
        ]);

        expect(first.ok).toBe(true);
        expect(second).toEqual({ ok: false, error: { code: 'BUSY' } });

        const retry = await service.bookStudent({ lastName: 'Lee', firstName: 'Ann', accessCode: '7788', tableId: 'T3' });
        expect(retry.ok).toBe(true);
    });

    it('should book an open guest under a tidied name', async () => {
        const result = await createService(new MemoryTableStore(seedData))
            .bookGuest({ name: '  Sam   Lee ', partySize: 3, tableId: 'T2' });
        expect(result.ok && result.value.fullName).toBe('Sam Lee');
    });

    it('should refuse an open booking whose name contains a comma', async () => {
        const store = new MemoryTableStore(seedData);
        const result = await createService(store).bookGuest({ name: 'Doe, Chris', partySize: 1, tableId: 'T2' });

        expect(result).toEqual({ ok: false, error: { code: 'INVALID_NAME', name: 'Doe, Chris' } });
        expect(await store.read('Tables')).toEqual(seedData.Tables);
    });

    it('should classify tables for the map', async () => {
        const markers = await createService(new MemoryTableStore(seedData)).seatingMap();
        expect(markers.map(m => [m.id, m.status])).toEqual([
            ['T1', 'SOLD_OUT'],
            ['T2', 'AVAILABLE'],
            ['T3', 'AVAILABLE'],
            ['T4', 'NEARLY_FULL']
        ]);
    });

    it('should propagate store failures', async () => {
        const broken: TableStore = {
            read: async () => { throw new StoreUnavailableError('sheet offline'); },
            replace: async () => { throw new StoreUnavailableError('sheet offline'); }
        };
        await expect(createService(broken).listCandidates(2)).rejects.toBeInstanceOf(StoreUnavailableError);
    });
});
