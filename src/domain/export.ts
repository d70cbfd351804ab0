import type { SeatingTable } from "../types";

const HEADER = ['Table_ID', 'Capacity', 'Taken', 'Guest_List'] as const;

const escapeField = (value: string | number): string => {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Administrator export: one comma-separated line per table, after a header line
 *
 * Example:
 *   Table_ID,Capacity,Taken,Guest_List
 *   A1,8,8,Jane Doe (8)
 *   A2,6,3,"Sam Lee (2), Ann Lee (1)"
 */
export const exportTablesCsv = (tables: SeatingTable[]): string => {
    const rows = tables.map(t => [t.id, t.capacity, t.taken, t.guestList].map(escapeField).join(','));
    return [HEADER.join(','), ...rows].map(line => `${line}\n`).join('');
}
