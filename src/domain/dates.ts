import { addDays, format } from "date-fns";
import type { Day } from "../types";

/**
 * Resolve a logical day to the calendar date the API expects
 *
 * Uses local wall-clock time. Tomorrow is the next calendar day, so DST
 * switches and month or year boundaries still move exactly one day.
 *
 * @param day - 'today' or 'tomorrow'
 * @param now - Clock reading, defaults to the current time
 * @returns Date in YYYY-MM-DD format
 */
export const resolveDate = (day: Day, now: Date = new Date()): string => {
    return format(addDays(now, day === 'tomorrow' ? 1 : 0), 'yyyy-MM-dd');
}

/**
 * Current local time truncated to minutes (HH:mm)
 */
export const currentTime = (now: Date = new Date()): string => format(now, 'HH:mm');

/**
 * Extract HH:mm from a backend timestamp such as "2026-03-14 08:00:00.000000"
 */
export const timeOfDay = (timestamp: string): string => timestamp.slice(11, 16);
