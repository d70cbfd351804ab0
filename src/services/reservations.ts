import type { FastifyBaseLogger } from 'fastify';
import { formatISO } from 'date-fns';
import type * as types from "../types";
import { checkAccessCode, findStudent, fullName } from '../domain/roster';
import { findEligibleTables, getRemaining, planBooking, toSummary } from '../domain/engine';
import { findSeatedTable, searchGuests } from '../domain/guests';
import { buildSeatingMap } from '../domain/status';
import { exportTablesCsv } from '../domain/export';
import { KeyedLock } from '../store/lock';

export interface ReservationServiceOptions {
    nearlyFullThreshold: number;
    /** Re-read the target table right before writing and refuse the commit if it changed */
    verifyBeforeCommit: boolean;
    lockTtlMs?: number;
    now?: () => Date;
}

const BOOKING_LOCK = 'Tables';

/**
 * Reservation workflow around the Table Store
 *
 * Every operation reads a fresh snapshot, hands it to the pure domain
 * functions and, for bookings, writes the whole `Tables` collection back.
 * Refusals come back as values; store failures are thrown as StoreUnavailableError.
 */
export class ReservationService {
    private readonly lock: KeyedLock;
    private readonly now: () => Date;

    constructor(
        private readonly store: types.TableStore,
        private readonly options: ReservationServiceOptions,
        private readonly logger?: FastifyBaseLogger
    ) {
        this.lock = new KeyedLock(options.lockTtlMs);
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Identify a student and check their access code
     *
     * An empty code is PENDING; only a wrong code is refused with ACCESS_DENIED.
     */
    async checkAccess(lastName: string, firstName: string, accessCode: string): Promise<types.Result<types.AccessGrant>> {
        const students = await this.store.read('Students');
        const found = findStudent(students, lastName, firstName);
        if (!found.ok) return found;

        const status = checkAccessCode(found.value, accessCode);
        if (status === 'DENIED') return { ok: false, error: { code: 'ACCESS_DENIED' } };
        if (status === 'PENDING') return { ok: true, value: { status } };

        const name = fullName(found.value);
        const tables = await this.store.read('Tables');
        return {
            ok: true,
            value: {
                status,
                student: { fullName: name, ticketAllotment: found.value.ticketAllotment },
                seatedAt: findSeatedTable(tables, name)
            }
        };
    }

    /**
     * Tables that can seat a party right now
     */
    async listCandidates(partySize: number): Promise<types.Result<types.TableSummary[]>> {
        const tables = await this.store.read('Tables');
        const candidates = findEligibleTables(tables, partySize);
        if (candidates.length === 0) {
            return { ok: false, error: { code: 'NO_CAPACITY', partySize } };
        }
        return { ok: true, value: candidates.map(toSummary) };
    }

    /**
     * Gated booking: the party size is the student's ticket allotment
     */
    async bookStudent(input: {
        lastName: string;
        firstName: string;
        accessCode: string;
        tableId: string;
    }): Promise<types.Result<types.BookingConfirmation>> {
        const students = await this.store.read('Students');
        const found = findStudent(students, input.lastName, input.firstName);
        if (!found.ok) return found;

        const status = checkAccessCode(found.value, input.accessCode);
        if (status === 'PENDING') return { ok: false, error: { code: 'ACCESS_CODE_REQUIRED' } };
        if (status === 'DENIED') {
            this.logger?.warn({ lastName: input.lastName, firstName: input.firstName }, 'access code rejected');
            return { ok: false, error: { code: 'ACCESS_DENIED' } };
        }

        return this.commit({
            fullName: fullName(found.value),
            partySize: found.value.ticketAllotment,
            tableId: input.tableId
        });
    }

    /**
     * Open booking: name and party size as typed, no roster check
     */
    async bookGuest(input: { name: string; partySize: number; tableId: string }): Promise<types.Result<types.BookingConfirmation>> {
        return this.commit({
            fullName: input.name.trim().replace(/\s+/g, ' '),
            partySize: input.partySize,
            tableId: input.tableId
        });
    }

    /**
     * Plan against a snapshot and write the result back
     *
     * With verifyBeforeCommit `Tables` is re-read just before the write. If the
     * target row changed in between, nothing is written and the attempt is
     * STALE_SELECTION. Otherwise the booking is planned again on that fresh read,
     * so a seat taken elsewhere in the meantime still counts as ALREADY_SEATED,
     * and concurrent edits to other tables survive. This narrows the
     * lost-update window across processes without closing it.
     */
    private async commit(request: types.BookingRequest): Promise<types.Result<types.BookingConfirmation>> {
        const lockToken = this.lock.acquire(BOOKING_LOCK);
        if (lockToken === null) {
            return { ok: false, error: { code: 'BUSY' } };
        }

        try {
            const snapshot = await this.store.read('Tables');
            let plan = planBooking(snapshot, request);

            if (plan.ok && this.options.verifyBeforeCommit) {
                const fresh = await this.store.read('Tables');
                const before = snapshot.find(t => t.id === request.tableId);
                const current = fresh.find(t => t.id === request.tableId);
                if (!before || !current || current.taken !== before.taken || current.guestList !== before.guestList) {
                    this.logger?.warn({ tableId: request.tableId }, 'table changed before commit');
                    return { ok: false, error: { code: 'STALE_SELECTION', tableId: request.tableId } };
                }
                plan = planBooking(fresh, request);
            }

            if (!plan.ok) {
                this.logger?.info({ ...request, reason: plan.error.code }, 'booking refused');
                return plan;
            }

            const { table, tables } = plan.value;
            await this.store.replace('Tables', tables);
            this.logger?.info({ tableId: table.id, partySize: request.partySize, taken: table.taken }, 'booking committed');

            return {
                ok: true,
                value: {
                    tableId: table.id,
                    fullName: request.fullName,
                    partySize: request.partySize,
                    taken: table.taken,
                    remaining: getRemaining(table),
                    bookedAt: formatISO(this.now())
                }
            };
        } finally {
            this.lock.release(BOOKING_LOCK, lockToken);
        }
    }

    async seatingMap(): Promise<types.MapMarker[]> {
        const tables = await this.store.read('Tables');
        return buildSeatingMap(tables, this.options.nearlyFullThreshold);
    }

    async search(query: string): Promise<types.SearchHit[]> {
        const tables = await this.store.read('Tables');
        return searchGuests(tables, query);
    }

    async exportCsv(): Promise<string> {
        const tables = await this.store.read('Tables');
        return exportTablesCsv(tables);
    }
}
