import type { GuestEntry, SearchHit, SeatingTable } from "../types";

const ENTRY_PATTERN = /^(.*?)\s*\((\d+)\)$/;

/** Characters that delimit guest list entries and cannot appear in a name */
export const RESERVED_NAME_CHARS = /[,()]/;

/**
 * Whether a name can be written to a guest list and read back as one entry
 */
export const isLedgerSafeName = (name: string): boolean => name.trim().length > 0 && !RESERVED_NAME_CHARS.test(name);

/**
 * Key used for guest list membership: whitespace collapsed, lower-cased
 */
export const guestNameKey = (name: string): string => name.trim().replace(/\s+/g, ' ').toLowerCase();

/**
 * Parse a free text guest list into entries
 *
 * Accepts both "Jane Doe (2)" and the older "Jane Doe(2)" spelling, and
 * ignores empty segments left by trailing separators.
 * Segments without a "(n)" suffix are kept with a null party size.
 *
 * Example: "Jane Doe (2), Sam Lee(4), " => [Jane Doe/2, Sam Lee/4]
 *
 * @param guestList - Raw guest list text
 * @returns Entries in ledger order
 */
export const parseGuestList = (guestList: string): GuestEntry[] => {
    return guestList
        .split(',')
        .map(segment => segment.trim())
        .filter(segment => segment.length > 0)
        .map(segment => {
            const match = ENTRY_PATTERN.exec(segment);
            if (!match) return { name: segment, partySize: null };
            return { name: match[1] ?? '', partySize: Number(match[2]) };
        });
}

export const formatGuestEntry = (name: string, partySize: number): string => `${name} (${partySize})`;

/**
 * Append a reservation to a guest list
 *
 * Existing text is kept as is, except for a trailing separator which is dropped
 * before the new entry. An empty list starts without a leading separator.
 */
export const appendGuest = (guestList: string, name: string, partySize: number): string => {
    const entry = formatGuestEntry(name, partySize);
    const base = guestList.replace(/[\s,]+$/, '');
    return base ? `${base}, ${entry}` : entry;
}

/**
 * Find the table a guest is already seated at
 *
 * Membership is an exact match on the normalized full name, so "Ann Lee"
 * is not found in "Ann Lee-Smith (2)".
 *
 * @returns Table id, or null when the name is in no guest list
 */
export const findSeatedTable = (tables: SeatingTable[], name: string): string | null => {
    const key = guestNameKey(name);
    const table = tables.find(t => parseGuestList(t.guestList).some(entry => guestNameKey(entry.name) === key));
    return table ? table.id : null;
}

/**
 * Search guest lists by name
 *
 * Case-insensitive substring search over each table's guest list text.
 * A blank query returns no hits.
 */
export const searchGuests = (tables: SeatingTable[], query: string): SearchHit[] => {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    return tables
        .filter(t => t.guestList.toLowerCase().includes(needle))
        .map(t => ({
            tableId: t.id,
            guestList: t.guestList,
            guests: parseGuestList(t.guestList).filter(entry => entry.name.toLowerCase().includes(needle))
        }));
}
