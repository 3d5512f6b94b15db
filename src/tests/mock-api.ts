import fastify, { type FastifyInstance } from 'fastify';
import { createTransportContext } from '../store/transport-context';
import type { TransportContext } from '../types';

export const TICKET_COOKIE = 'wengine_vpn_ticket=test-ticket';
export const TEST_USER_AGENT = 'test-agent/1.0';

/**
 * Payloads served by the mock seat API, keyed the way the real API is
 */
export interface MockApiData {
    libraries: unknown[];
    /** Child areas per library id */
    floors: Record<string, unknown[]>;
    /** Child areas per floor id; the requested date is recorded */
    sections: Record<string, unknown[]>;
    /** Day segments per section id */
    days: Record<string, unknown[]>;
    seats: unknown[];
}

export interface MockApi {
    app: FastifyInstance;
    /** Base URL ending in /api.php */
    apiPrefix: string;
    sectionDates: string[];
    seatQueries: Record<string, string>[];
}

export const seedData: MockApiData = {
    libraries: [
        { id: 1, name: '北馆', nameMerge: '北馆(李文正馆)', enname: 'North Library', ennameMerge: 'North Library (Li Wenzheng)', isValid: 1 },
        { id: 3, name: '文科馆', nameMerge: '文科馆', enname: 'Humanities Library', ennameMerge: 'Humanities Library', isValid: 0 },
    ],
    floors: {
        '1': [
            { id: 12, name: '二层', enname: '2F', isValid: 1 },
            { id: 13, name: '三层', enname: '3F', isValid: 0 },
        ],
    },
    sections: {
        '12': [
            { id: 5, name: 'B区', enname: 'Zone B', TotalCount: 10, UnavailableSpace: 3, isValid: 1 },
            { id: 2, name: 'A区', enname: 'Zone A', TotalCount: 4, UnavailableSpace: 4, isValid: 1 },
            { id: 8, name: 'C区', enname: 'Zone C', TotalCount: 6, UnavailableSpace: 0, isValid: 0 },
        ],
    },
    days: {
        '5': [
            {
                id: 301,
                day: '2026-03-14',
                startTime: { date: '2026-03-14 08:00:00.000000', timezone_type: 3, timezone: 'Asia/Shanghai' },
                endTime: { date: '2026-03-14 22:00:00.000000', timezone_type: 3, timezone: 'Asia/Shanghai' },
            },
            {
                id: 302,
                day: '2026-03-15',
                startTime: { date: '2026-03-15 08:30:00.000000', timezone_type: 3, timezone: 'Asia/Shanghai' },
                endTime: { date: '2026-03-15 21:30:00.000000', timezone_type: 3, timezone: 'Asia/Shanghai' },
            },
        ],
        '2': [
            {
                id: 401,
                day: '2026-03-14',
                startTime: { date: '2026-03-14 08:00:00.000000' },
                endTime: { date: '2026-03-14 12:00:00.000000' },
            },
            {
                id: 402,
                day: '2026-03-14',
                startTime: { date: '2026-03-14 13:00:00.000000' },
                endTime: { date: '2026-03-14 22:00:00.000000' },
            },
        ],
    },
    seats: [
        { id: 9001, name: 'B001', area_type: 1, status: 1 },
        { id: 9002, name: 'B002', area_type: 1, status: 6 },
        { id: 9003, name: 'B003', area_type: 2, status: 7 },
        { id: 9004, name: 'B004', area_type: 1, status: 2 },
    ],
};

/**
 * Start an in-process stand-in for the tunnelled seat API on an ephemeral port
 *
 * Requests without the tunnel ticket cookie get 403, like an expired session.
 */
export const startMockApi = async (data: MockApiData = seedData): Promise<MockApi> => {
    const app = fastify();
    const sectionDates: string[] = [];
    const seatQueries: Record<string, string>[] = [];

    app.addHook('onRequest', async (request, reply) => {
        if (request.headers.cookie !== TICKET_COOKIE) {
            return reply.code(403).send('forbidden');
        }
    });

    const ok = (payload: unknown) => ({ status: 1, data: payload });

    app.get('/api.php/areas/1/tree/1', async () => ok({ list: data.libraries }));

    app.get<{ Params: { id: string } }>('/api.php/areas/:id', async (request) =>
        ok({ list: { childArea: data.floors[request.params.id] ?? [] } }));

    app.get<{ Params: { id: string; date: string } }>('/api.php/areas/:id/date/:date', async (request) => {
        sectionDates.push(request.params.date);
        return ok({ list: { childArea: data.sections[request.params.id] ?? [] } });
    });

    app.get<{ Params: { id: string } }>('/api.php/areadays/:id', async (request) =>
        ok({ list: data.days[request.params.id] ?? [] }));

    app.get<{ Querystring: Record<string, string> }>('/api.php/spaces_old/', async (request) => {
        seatQueries.push({ ...request.query });
        return ok({ list: data.seats });
    });

    // Protocol and transport failures
    app.get('/api.php/moved', async (_, reply) =>
        reply.code(302).header('location', '/api.php/areas/1/tree/1').send());
    app.get('/api.php/broken', async (_, reply) => reply.code(500).send('upstream down'));
    app.get('/api.php/not-json', async (_, reply) => reply.type('text/html').send('<html>login</html>'));
    app.get('/api.php/refused', async () => ({ status: 0, msg: 'session expired' }));
    app.get('/api.php/bare', async () => ({ list: [] }));
    app.get('/api.php/user-agent', async (request) => ok({ userAgent: request.headers['user-agent'] }));

    const address = await app.listen({ port: 0, host: '127.0.0.1' });
    return { app, apiPrefix: `${address}/api.php`, sectionDates, seatQueries };
};

/**
 * Transport context holding the mock API's ticket cookie
 */
export const createTestContext = (): Promise<TransportContext> =>
    createTransportContext(
        [{ name: 'wengine_vpn_ticket', value: 'test-ticket', domain: '127.0.0.1', path: '/', expires: -1, httpOnly: true, secure: false }],
        TEST_USER_AGENT
    );
