import type { FastifyReply, FastifyRequest } from 'fastify';
import { format } from 'date-fns';
import {
    AccessRequestSchema,
    GatedBookingSchema,
    SearchQuerySchema,
    candidatesQuerySchema,
    openBookingSchema
} from './schemas';
import type { ReservationService } from './services/reservations';
import type { AppConfig } from './config';
import type { SeatingError } from './types';

type Handler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

/**
 * Translate a refusal into its HTTP status and body
 */
export const sendSeatingError = (reply: FastifyReply, error: SeatingError) => {
    switch (error.code) {
        case 'NOT_FOUND':
            return reply.status(404).send({ error: 'not_found', detail: 'No student with that name' });
        case 'AMBIGUOUS_RECORD':
            return reply.status(409).send({ error: 'ambiguous_record', detail: `${error.matches} students share that name` });
        case 'ACCESS_CODE_REQUIRED':
            return reply.status(401).send({ error: 'access_code_required', detail: 'Enter your access code' });
        case 'ACCESS_DENIED':
            return reply.status(403).send({ error: 'access_denied', detail: 'Access code does not match' });
        case 'INVALID_NAME':
            return reply.status(400).send({ error: 'invalid_name', detail: 'Name cannot contain commas or parentheses' });
        case 'ALREADY_SEATED':
            return reply.status(409).send({ error: 'already_seated', tableId: error.tableId, detail: `Already booked at table ${error.tableId}` });
        case 'NO_CAPACITY':
            return reply.status(409).send({ error: 'no_capacity', detail: `No table has ${error.partySize} seats left` });
        case 'NOT_ELIGIBLE':
            return reply.status(409).send({ error: 'not_eligible', tableId: error.tableId, remaining: error.remaining, detail: 'Table cannot seat this party' });
        case 'STALE_SELECTION':
            return reply.status(409).send({ error: 'stale_selection', tableId: error.tableId, detail: 'Table changed, please pick again' });
        case 'BUSY':
            return reply.status(409).send({ error: 'conflict', detail: 'System busy, please retry' });
    }
}

/**
 * Build the /seating route handlers around a reservation service
 */
export const createHandlers = (service: ReservationService, config: AppConfig) => {
    /**
     * Identify a student and check their access code
     *
     * @returns { status: 'PENDING' } while no code was submitted, or
     *   { status: 'GRANTED', student, seatedAt } once the code matches
     *
     * @throws {400} Invalid input
     * @throws {403} Access code does not match
     * @throws {404} No such student
     * @throws {409} Several students share the name
     */
    const access: Handler = async (request, reply) => {
        const body = AccessRequestSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const { lastName, firstName, accessCode } = body.data;

        const result = await service.checkAccess(lastName, firstName, accessCode);
        if (!result.ok) return sendSeatingError(reply, result.error);
        return result.value;
    }

    /**
     * List tables with room for a party
     *
     * @throws {400} Invalid input
     * @throws {409} No table fits the party
     */
    const tables: Handler = async (request, reply) => {
        const query = candidatesQuerySchema(config.maxPartySize).safeParse(request.query);
        if (!query.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: query.error.format() });
        }
        const { partySize } = query.data;

        const result = await service.listCandidates(partySize);
        if (!result.ok) return sendSeatingError(reply, result.error);
        return { partySize, candidates: result.value };
    }

    /**
     * Reserve the student's ticket allotment at the picked table
     *
     * @returns 201 with the booking confirmation
     */
    const bookings: Handler = async (request, reply) => {
        const body = GatedBookingSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }

        const result = await service.bookStudent(body.data);
        if (!result.ok) return sendSeatingError(reply, result.error);
        return reply.status(201).send(result.value);
    }

    /**
     * Reserve seats for a typed name, without the roster gate
     *
     * @throws {404} Open booking is disabled
     */
    const openBookings: Handler = async (request, reply) => {
        if (!config.openBooking) {
            return reply.status(404).send({ error: 'not_found', detail: 'Open booking is disabled' });
        }
        const body = openBookingSchema(config.maxPartySize).safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }

        const result = await service.bookGuest(body.data);
        if (!result.ok) return sendSeatingError(reply, result.error);
        return reply.status(201).send(result.value);
    }

    const map: Handler = async () => {
        return { threshold: config.nearlyFullThreshold, tables: await service.seatingMap() };
    }

    const search: Handler = async (request, reply) => {
        const query = SearchQuerySchema.safeParse(request.query);
        if (!query.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: query.error.format() });
        }
        const { q } = query.data;
        return { query: q, results: await service.search(q) };
    }

    /**
     * Download every table as CSV
     *
     * @throws {401} ADMIN_TOKEN is set and x-admin-token does not match
     */
    const exportCsv: Handler = async (request, reply) => {
        if (config.adminToken && request.headers['x-admin-token'] !== config.adminToken) {
            return reply.status(401).send({ error: 'unauthorized' });
        }
        const csv = await service.exportCsv();
        const filename = `seating-${format(new Date(), 'yyyyMMdd-HHmm')}.csv`;
        return reply
            .header('content-type', 'text/csv; charset=utf-8')
            .header('content-disposition', `attachment; filename="${filename}"`)
            .send(csv);
    }

    return { access, tables, bookings, openBookings, map, search, exportCsv };
}
