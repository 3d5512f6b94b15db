import type { CookieJar } from 'tough-cookie';

/**
 * Logical day a query is made for
 *
 * The reservation system only opens today and tomorrow.
 */
export type Day = 'today' | 'tomorrow';

/**
 * Library building, the root of the area tree
 */
export interface Library {
    readonly id: number;
    readonly name: string;
    /** Display name merged with the campus prefix */
    readonly nameMerge: string;
    readonly enname: string;
    readonly ennameMerge: string;
}

/**
 * Floor inside a library
 */
export interface Floor {
    readonly id: number;
    readonly name: string;
    readonly enname: string;
    /** Owning library id */
    readonly parent: number;
}

/**
 * Reading-room section on a floor
 *
 * `available` is derived as total minus unavailable seats for the queried date.
 */
export interface Section {
    readonly id: number;
    readonly name: string;
    readonly enname: string;
    readonly total: number;
    readonly available: number;
    /** Owning floor id */
    readonly parent: number;
}

/**
 * Reservable time window of a section on one date
 */
export interface DaySegment {
    readonly id: number;
    /** YYYY-MM-DD */
    readonly date: string;
    /** Opening time, HH:mm */
    readonly startTime: string;
    /** Closing time, HH:mm */
    readonly endTime: string;
    readonly day: Day;
}

export interface Seat {
    readonly id: number;
    readonly name: string;
    /** Seat type code (area_type in the API) */
    readonly type: number;
    /** Raw status code, see domain/status */
    readonly status: number;
    /** Owning section id */
    readonly parent: number;
}

/**
 * Cookie as reported by the browser after login
 *
 * `expires` is in seconds since the epoch, -1 for session cookies.
 */
export interface BrowserCookie {
    name: string;
    value: string;
    domain: string;
    path: string;
    expires: number;
    httpOnly: boolean;
    secure: boolean;
}

/**
 * Authenticated, non-interactive HTTP state reused for every API call
 */
export interface TransportContext {
    readonly jar: CookieJar;
    readonly headers: Readonly<Record<string, string>>;
}

export interface Credentials {
    username: string;
    password: string;
}

export type QueryParams = Record<string, string | number>;
