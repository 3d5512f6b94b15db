import type { z } from 'zod';
import type * as types from "../types";
import type { JsonSource } from '../client';
import defaultLogger, { type Logger } from '../logger';
import { InvariantError, ProtocolError } from '../errors';
import { currentTime, resolveDate, timeOfDay } from './dates';
import {
    ChildAreaListSchema,
    DaySegmentListSchema,
    FloorPayloadSchema,
    LibraryListSchema,
    LibraryPayloadSchema,
    SeatListSchema,
    SectionPayloadSchema
} from '../schemas';

export interface WalkerOptions {
    /** API base URL ending in /api.php, no trailing slash */
    apiPrefix: string;
    /** Clock used for date resolution and the seat query start time */
    now?: () => Date;
    logger?: Logger;
}

/**
 * Validate a payload against its schema
 *
 * @throws {ProtocolError} When the payload does not have the expected shape
 */
const parsePayload = <T extends z.ZodTypeAny>(schema: T, payload: unknown, what: string): z.infer<T> => {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        throw new ProtocolError(`Unexpected ${what} payload: ${detail}`);
    }
    return parsed.data;
}

/**
 * Walks library → floor → section → day segment → seats
 *
 * Each level consumes its parent entity and re-fetches its children; nothing
 * is cached between calls. Entries flagged invalid never leave this class.
 */
export class HierarchyWalker {
    private readonly apiPrefix: string;
    private readonly now: () => Date;
    private readonly log: Logger;

    constructor(private readonly source: JsonSource, options: WalkerOptions) {
        this.apiPrefix = options.apiPrefix;
        this.now = options.now ?? (() => new Date());
        this.log = (options.logger ?? defaultLogger).child({ component: 'hierarchy-walker' });
    }

    /**
     * List every open library
     */
    async listLibraries(): Promise<types.Library[]> {
        const data = await this.source.getJson(`${this.apiPrefix}/areas/1/tree/1`);
        const { list } = parsePayload(LibraryListSchema, data, 'library list');

        return list
            .filter(entry => entry.isValid === 1)
            .map(entry => {
                const library = parsePayload(LibraryPayloadSchema, entry, 'library');
                return {
                    id: library.id,
                    name: library.name,
                    nameMerge: library.nameMerge,
                    enname: library.enname,
                    ennameMerge: library.ennameMerge
                };
            });
    }

    /**
     * List the open floors of a library
     */
    async listFloors(library: types.Library): Promise<types.Floor[]> {
        const data = await this.source.getJson(`${this.apiPrefix}/areas/${library.id}`);
        const { list } = parsePayload(ChildAreaListSchema, data, 'floor list');

        return list.childArea
            .filter(entry => entry.isValid === 1)
            .map(entry => {
                const floor = parsePayload(FloorPayloadSchema, entry, 'floor');
                return { id: floor.id, name: floor.name, enname: floor.enname, parent: library.id };
            });
    }

    /**
     * List the open sections of a floor with their availability on a day
     *
     * @returns Sections sorted ascending by id
     * @throws {InvariantError} When a section's counts give available outside 0..total
     */
    async listSections(floor: types.Floor, day: types.Day = 'today'): Promise<types.Section[]> {
        const date = resolveDate(day, this.now());
        const data = await this.source.getJson(`${this.apiPrefix}/areas/${floor.id}/date/${date}`);
        const { list } = parsePayload(ChildAreaListSchema, data, 'section list');

        return list.childArea
            .filter(entry => entry.isValid === 1)
            .map(entry => {
                const section = parsePayload(SectionPayloadSchema, entry, 'section');
                const total = section.TotalCount;
                const available = total - section.UnavailableSpace;
                if (total < 0 || available < 0 || available > total) {
                    throw new InvariantError(
                        `Section ${section.id} reports ${section.UnavailableSpace} unavailable of ${total} seats`
                    );
                }
                return {
                    id: section.id,
                    name: section.name,
                    enname: section.enname,
                    total,
                    available,
                    parent: floor.id
                };
            })
            .sort((a, b) => a.id - b.id);
    }

    /**
     * Find the section's day segment for a day
     *
     * @throws {InvariantError} Unless exactly one segment matches the resolved date
     */
    async resolveDay(section: types.Section, day: types.Day = 'today'): Promise<types.DaySegment> {
        const date = resolveDate(day, this.now());
        const data = await this.source.getJson(`${this.apiPrefix}/areadays/${section.id}`);
        const { list } = parsePayload(DaySegmentListSchema, data, 'day segment list');

        const matches = list.filter(segment => segment.day === date);
        const [segment] = matches;
        if (matches.length !== 1 || !segment) {
            throw new InvariantError(
                `Expected exactly one day segment for section ${section.id} on ${date}, found ${matches.length}`
            );
        }

        return {
            id: segment.id,
            date: segment.day,
            startTime: timeOfDay(segment.startTime.date),
            endTime: timeOfDay(segment.endTime.date),
            day
        };
    }

    /**
     * List every seat of a section within a day segment
     *
     * Today's query starts at the current minute since only the remaining
     * availability matters; tomorrow's starts at opening time.
     */
    async listSeats(section: types.Section, segment: types.DaySegment): Promise<types.Seat[]> {
        const startTime = segment.day === 'today' ? currentTime(this.now()) : segment.startTime;
        this.log.debug({ section: section.id, segment: segment.id, startTime }, 'Listing seats');

        const data = await this.source.getJson(`${this.apiPrefix}/spaces_old/`, {
            area: section.id,
            segment: segment.id,
            day: segment.date,
            startTime,
            endTime: segment.endTime
        });
        const { list } = parsePayload(SeatListSchema, data, 'seat list');

        return list.map(seat => ({
            id: seat.id,
            name: seat.name,
            type: seat.area_type,
            status: seat.status,
            parent: section.id
        }));
    }
}
