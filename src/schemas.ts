import { z } from 'zod';

/**
 * Outer wrapper of every API response
 *
 * `status` is 1 on success; the payload lives under `data`.
 */
export const EnvelopeSchema = z.object({
    status: z.number(),
    data: z.unknown(),
});

/**
 * Any area entry, checked only for the validity flag
 *
 * Invalid entries are dropped before their remaining fields are read.
 */
export const AreaEntrySchema = z.object({
    /** 1 when the area is open for reservation */
    isValid: z.number(),
}).passthrough();

/** data of GET areas/1/tree/1 */
export const LibraryListSchema = z.object({
    list: z.array(AreaEntrySchema),
});

/** data of GET areas/{id} and areas/{id}/date/{date} */
export const ChildAreaListSchema = z.object({
    list: z.object({
        childArea: z.array(AreaEntrySchema),
    }),
});

export const LibraryPayloadSchema = z.object({
    id: z.number(),
    name: z.string(),
    nameMerge: z.string(),
    enname: z.string(),
    ennameMerge: z.string(),
});

export const FloorPayloadSchema = z.object({
    id: z.number(),
    name: z.string(),
    enname: z.string(),
});

export const SectionPayloadSchema = z.object({
    id: z.number(),
    name: z.string(),
    enname: z.string(),
    TotalCount: z.number(),
    UnavailableSpace: z.number(),
});

/**
 * Timestamp object as serialized by the backend
 *
 * `date` looks like "2026-03-14 08:00:00.000000"; HH:mm sits at offset 11.
 */
const TimestampSchema = z.object({
    date: z.string().min(16),
});

/** data of GET areadays/{sectionId} */
export const DaySegmentListSchema = z.object({
    list: z.array(z.object({
        id: z.number(),
        /** YYYY-MM-DD */
        day: z.string(),
        startTime: TimestampSchema,
        endTime: TimestampSchema,
    })),
});

/** data of GET spaces_old/ */
export const SeatListSchema = z.object({
    list: z.array(z.object({
        id: z.number(),
        name: z.string(),
        area_type: z.number(),
        status: z.number(),
    })),
});

/**
 * Contents of the credentials file
 */
export const CredentialsSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
});
