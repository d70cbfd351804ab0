import type * as types from "../types";
import { appendGuest, findSeatedTable, isLedgerSafeName } from './guests';

/**
 * Free seats at a table
 */
export const getRemaining = (table: types.SeatingTable): number => table.capacity - table.taken;

export const toSummary = (table: types.SeatingTable): types.TableSummary => ({
    id: table.id,
    capacity: table.capacity,
    taken: table.taken,
    remaining: getRemaining(table)
});

/**
 * Tables that can still seat a party
 *
 * The boundary is inclusive: a party of exactly `remaining` fits.
 * A table with no seats left is never a candidate.
 *
 * @param tables - Current `Tables` snapshot
 * @param partySize - Seats requested
 * @returns Candidate tables in snapshot order
 */
export const findEligibleTables = (tables: types.SeatingTable[], partySize: number): types.SeatingTable[] => {
    return tables.filter(t => {
        const remaining = getRemaining(t);
        return remaining > 0 && remaining >= partySize;
    });
}

/**
 * Check that a picked table is still a member of the candidate set
 *
 * The candidate list shown to the requester may be stale by the time they
 * confirm, so the pick is validated against the snapshot being committed.
 */
export const validateSelection = (
    tables: types.SeatingTable[],
    tableId: string,
    partySize: number
): types.Result<types.SeatingTable> => {
    const table = findEligibleTables(tables, partySize).find(t => t.id === tableId);
    if (table) return { ok: true, value: table };

    const known = tables.find(t => t.id === tableId);
    return {
        ok: false,
        error: { code: 'NOT_ELIGIBLE', tableId, remaining: known ? getRemaining(known) : null }
    };
}

/**
 * Apply a reservation to a snapshot
 *
 * Returns a new collection; only the chosen table differs from the input.
 */
export const applyBooking = (
    tables: types.SeatingTable[],
    tableId: string,
    fullName: string,
    partySize: number
): types.SeatingTable[] => {
    return tables.map(t => t.id === tableId
        ? { ...t, taken: t.taken + partySize, guestList: appendGuest(t.guestList, fullName, partySize) }
        : t);
}

/**
 * Plan a booking against a snapshot, without touching the store
 *
 * Checks, in order:
 * 0. Name: commas or parentheses would split the guest list entry -> INVALID_NAME
 * 1. Duplicate: the name is already in some guest list -> ALREADY_SEATED
 * 2. Eligibility: no table fits the party -> NO_CAPACITY
 * 3. Selection: the picked table is not a candidate -> NOT_ELIGIBLE
 *
 * @param tables - Current `Tables` snapshot
 * @param request - Identified requester, party size and picked table
 * @returns Updated table plus the full collection to write back, or the refusal
 */
export function planBooking(
    tables: types.SeatingTable[],
    request: types.BookingRequest
): types.Result<types.BookingPlan> {
    const { fullName, partySize, tableId } = request;

    if (!isLedgerSafeName(fullName)) {
        return { ok: false, error: { code: 'INVALID_NAME', name: fullName } };
    }

    const seatedAt = findSeatedTable(tables, fullName);
    if (seatedAt !== null) {
        return { ok: false, error: { code: 'ALREADY_SEATED', tableId: seatedAt } };
    }

    if (findEligibleTables(tables, partySize).length === 0) {
        return { ok: false, error: { code: 'NO_CAPACITY', partySize } };
    }

    const selection = validateSelection(tables, tableId, partySize);
    if (!selection.ok) return selection;

    const next = applyBooking(tables, tableId, fullName, partySize);
    const table = next.find(t => t.id === tableId) ?? selection.value;

    return { ok: true, value: { table, tables: next } };
}
