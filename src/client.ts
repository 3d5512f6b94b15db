import { EnvelopeSchema } from './schemas';
import { ProtocolError, TransportError } from './errors';
import defaultLogger, { type Logger } from './logger';
import type { QueryParams, TransportContext } from './types';

const MAX_REDIRECTS = 30;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Anything the hierarchy walker can read JSON payloads from
 */
export interface JsonSource {
    getJson(url: string, params?: QueryParams): Promise<unknown>;
}

interface RawResponse {
    status: number;
    url: string;
    body: string;
}

/**
 * Single point of contact with the seat system's JSON API
 *
 * Sends the tunnel cookies and fixed headers of the transport context with
 * every request and enforces the `{ status: 1, data }` envelope. Failures are
 * thrown, never retried.
 */
export class ResourceClient implements JsonSource {
    private readonly log: Logger;

    constructor(private readonly context: TransportContext, options: { logger?: Logger } = {}) {
        this.log = (options.logger ?? defaultLogger).child({ component: 'resource-client' });
    }

    /**
     * GET a resource and return the envelope's `data`
     *
     * @param url - Absolute endpoint URL
     * @param params - Optional query string parameters
     * @throws {TransportError} Final HTTP status is not 200, or no response at all (status 0)
     * @throws {ProtocolError} Body is not JSON or the envelope status is not 1
     */
    async getJson(url: string, params?: QueryParams): Promise<unknown> {
        const response = await this.get(withQuery(url, params));
        if (response.status !== 200) {
            throw new TransportError(response.status, response.url);
        }

        let body: unknown;
        try {
            body = JSON.parse(response.body);
        } catch (error) {
            throw new ProtocolError(`Response from ${response.url} is not valid JSON`, { cause: error });
        }

        const envelope = EnvelopeSchema.safeParse(body);
        if (!envelope.success) {
            throw new ProtocolError(`Response from ${response.url} has no status envelope`);
        }
        if (envelope.data.status !== 1) {
            throw new ProtocolError(`Response from ${response.url} reported status ${envelope.data.status}`);
        }

        return envelope.data.data;
    }

    /**
     * GET following redirects by hand so cookies are recomputed for each hop
     */
    private async get(url: string): Promise<RawResponse> {
        let current = url;

        for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
            const headers: Record<string, string> = { ...this.context.headers, Accept: 'application/json' };
            const cookie = await this.context.jar.getCookieString(current);
            if (cookie) {
                headers.Cookie = cookie;
            }

            this.log.debug({ url: current }, 'GET');
            let response: Response;
            try {
                response = await fetch(current, { method: 'GET', headers, redirect: 'manual' });
            } catch (error) {
                throw new TransportError(0, current, `GET ${current} failed before a response arrived`, { cause: error });
            }
            const location = response.headers.get('location');

            if (REDIRECT_STATUSES.has(response.status) && location) {
                await response.arrayBuffer();
                current = new URL(location, current).toString();
                continue;
            }

            return { status: response.status, url: current, body: await response.text() };
        }

        throw new TransportError(0, url, `GET ${url} exceeded ${MAX_REDIRECTS} redirects`);
    }
}

const withQuery = (url: string, params?: QueryParams): string => {
    if (!params) return url;

    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        search.set(key, String(value));
    }
    return `${url}?${search.toString()}`;
}
