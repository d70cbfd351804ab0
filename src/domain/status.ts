import type { MapMarker, SeatingTable, TableStatus } from "../types";
import { getRemaining, toSummary } from './engine';

export const DEFAULT_NEARLY_FULL_THRESHOLD = 3;

/**
 * Map colour for a table
 *
 * - SOLD_OUT: no seats left
 * - NEARLY_FULL: fewer than `threshold` seats left
 * - AVAILABLE: everything else
 *
 * Purely informational; a NEARLY_FULL table is still bookable.
 */
export const classifyTable = (table: SeatingTable, threshold: number = DEFAULT_NEARLY_FULL_THRESHOLD): TableStatus => {
    const remaining = getRemaining(table);
    if (remaining <= 0) return 'SOLD_OUT';
    if (remaining < threshold) return 'NEARLY_FULL';
    return 'AVAILABLE';
}

export const buildSeatingMap = (tables: SeatingTable[], threshold: number = DEFAULT_NEARLY_FULL_THRESHOLD): MapMarker[] => {
    return tables.map(t => ({
        ...toSummary(t),
        x: t.x,
        y: t.y,
        status: classifyTable(t, threshold)
    }));
}
