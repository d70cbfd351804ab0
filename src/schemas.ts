import { z } from 'zod';
import { normalizeAccessCode } from './domain/roster';
import { RESERVED_NAME_CHARS } from './domain/guests';

const name = z.string().trim().min(1);

/**
 * Validation schema for POST /seating/access request body
 *
 * An absent access code is the same as an empty one: not yet submitted.
 */
export const AccessRequestSchema = z.object({
    lastName: name,
    firstName: name,
    /** Numbers are accepted, forms sometimes send codes as numbers */
    accessCode: z.coerce.string().default(''),
});

/**
 * Validation schema for POST /seating/bookings request body
 */
export const GatedBookingSchema = AccessRequestSchema.extend({
    tableId: name,
});

/**
 * Validation schema for POST /seating/bookings/open request body
 *
 * @param maxPartySize - Largest party a single open booking may reserve
 */
export const openBookingSchema = (maxPartySize: number) => z.object({
    /** Commas and parentheses delimit guest list entries */
    name: name.refine(v => !RESERVED_NAME_CHARS.test(v), 'Name cannot contain commas or parentheses'),
    partySize: z.number().int().positive().max(maxPartySize),
    tableId: name,
});

/**
 * Validation schema for GET /seating/tables query parameters
 */
export const candidatesQuerySchema = (maxPartySize: number) => z.object({
    /** Number of seats (automatically coerced from string) */
    partySize: z.coerce.number().int().positive().max(maxPartySize),
});

/**
 * Validation schema for GET /seating/search query parameters
 */
export const SearchQuerySchema = z.object({
    q: z.string().default(''),
});

const cell = z.union([z.string(), z.number()]).transform(v => String(v).trim());

/**
 * Row schema for the `Tables` collection as read from storage
 *
 * Spreadsheet exports leave empty guest lists as null and may store ids as numbers.
 */
export const TableRowSchema = z.object({
    id: cell.pipe(z.string().min(1)),
    capacity: z.coerce.number().int().positive(),
    taken: z.coerce.number().int().nonnegative(),
    guestList: z.string().nullish().transform(v => v ?? ''),
    x: z.coerce.number(),
    y: z.coerce.number(),
});

/**
 * Row schema for the `Students` collection as read from storage
 *
 * Access codes are normalized here, so the rest of the code only sees strings.
 */
export const StudentRowSchema = z.object({
    lastName: cell,
    firstName: cell,
    ticketAllotment: z.coerce.number().int().positive(),
    accessCode: z.union([z.string(), z.number()]).transform(normalizeAccessCode),
});

/**
 * Whole store document, also the shape of seed files
 */
export const StoreDocumentSchema = z.object({
    Tables: z.array(TableRowSchema).default([]),
    Students: z.array(StudentRowSchema).default([]),
});
