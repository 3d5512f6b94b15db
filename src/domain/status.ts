import type { Seat } from "../types";

/**
 * Seat status codes the reservation backend is known to send
 */
export const SEAT_STATUS = {
    1: 'free',
    4: 'under-maintenance',
    6: 'occupied',
    7: 'temporarily-vacated',
} as const;

export type SeatStatusCode = keyof typeof SEAT_STATUS;
export type SeatStatusLabel = (typeof SEAT_STATUS)[SeatStatusCode];
export type SeatSummary = Record<SeatStatusLabel | 'unknown', number>;

const isKnownStatus = (code: number): code is SeatStatusCode =>
    Object.prototype.hasOwnProperty.call(SEAT_STATUS, code);

/**
 * Map a status code to its label
 *
 * Codes outside the known set come back unchanged instead of being rejected,
 * so unexpected backend data stays visible.
 */
export const classifySeatStatus = (code: number): SeatStatusLabel | number =>
    isKnownStatus(code) ? SEAT_STATUS[code] : code;

export const describeSeatStatus = (code: number): string => {
    const status = classifySeatStatus(code);
    return typeof status === 'number' ? `unknown (${status})` : status;
}

/**
 * Count seats per status label; every label is present, zero when absent
 */
export const summarizeSeats = (seats: readonly Seat[]): SeatSummary => {
    const summary: SeatSummary = {
        'free': 0,
        'under-maintenance': 0,
        'occupied': 0,
        'temporarily-vacated': 0,
        'unknown': 0,
    };

    for (const seat of seats) {
        const status = classifySeatStatus(seat.status);
        summary[typeof status === 'number' ? 'unknown' : status] += 1;
    }

    return summary;
}
