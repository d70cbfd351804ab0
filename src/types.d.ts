/**
 * Seating table as stored in the `Tables` collection
 *
 * `remaining` is never stored; it is always derived as `capacity - taken`.
 */
export interface SeatingTable {
    id: string;
    /** Total seats at the table */
    capacity: number;
    /** Seats already reserved */
    taken: number;
    /** Free text ledger of reservations: "Jane Doe (2), Sam Lee (4)" */
    guestList: string;
    /** Map placement */
    x: number;
    y: number;
}

/**
 * Invitee from the `Students` roster
 *
 * Read-only from the reservation engine's point of view.
 */
export interface Student {
    lastName: string;
    firstName: string;
    /** Seats this student may reserve, also the party size of a gated booking */
    ticketAllotment: number;
    /** Opaque code, always a normalized string once past the store boundary */
    accessCode: string;
}

/**
 * Every collection the Table Store holds, keyed by collection name
 */
export interface StoreCollections {
    Tables: SeatingTable[];
    Students: Student[];
}

export type CollectionName = keyof StoreCollections;

/**
 * Persistent collection store
 *
 * Reads return the full collection; writes replace it wholesale.
 * No transactions and no concurrency token.
 */
export interface TableStore {
    read<C extends CollectionName>(collection: C): Promise<StoreCollections[C]>;
    replace<C extends CollectionName>(collection: C, rows: StoreCollections[C]): Promise<void>;
}

/**
 * One parsed guest list entry. `partySize` is null when the text carries no "(n)" suffix.
 */
export interface GuestEntry {
    name: string;
    partySize: number | null;
}

export type TableStatus = 'AVAILABLE' | 'NEARLY_FULL' | 'SOLD_OUT';

export type AccessStatus = 'PENDING' | 'GRANTED' | 'DENIED';

/**
 * Reasons a roster lookup or booking attempt is refused
 *
 * None of them mutate state; the requester may retry with different input.
 */
export type SeatingError =
    | { code: 'NOT_FOUND' }
    | { code: 'AMBIGUOUS_RECORD'; matches: number }
    | { code: 'ACCESS_CODE_REQUIRED' }
    | { code: 'ACCESS_DENIED' }
    | { code: 'INVALID_NAME'; name: string }
    | { code: 'ALREADY_SEATED'; tableId: string }
    | { code: 'NO_CAPACITY'; partySize: number }
    | { code: 'NOT_ELIGIBLE'; tableId: string; remaining: number | null }
    | { code: 'STALE_SELECTION'; tableId: string }
    | { code: 'BUSY' };

export type Result<T, E = SeatingError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

/**
 * Booking request once the requester has been identified
 */
export interface BookingRequest {
    fullName: string;
    partySize: number;
    tableId: string;
}

/**
 * Outcome of a planned booking: the updated table and the whole collection to write back
 */
export interface BookingPlan {
    table: SeatingTable;
    tables: SeatingTable[];
}

/**
 * Table offered to a requester, with derived free seats
 */
export interface TableSummary {
    id: string;
    capacity: number;
    taken: number;
    remaining: number;
}

/**
 * Seating map marker, one per table
 */
export interface MapMarker extends TableSummary {
    x: number;
    y: number;
    status: TableStatus;
}

/**
 * Guest search hit
 */
export interface SearchHit {
    tableId: string;
    guestList: string;
    /** Entries whose name contains the query */
    guests: GuestEntry[];
}

export interface BookingConfirmation {
    tableId: string;
    fullName: string;
    partySize: number;
    taken: number;
    remaining: number;
    /** ISO datetime string */
    bookedAt: string;
}

export interface AccessGrant {
    status: AccessStatus;
    student?: { fullName: string; ticketAllotment: number };
    /** Table the student already sits at, if any */
    seatedAt?: string | null;
}
