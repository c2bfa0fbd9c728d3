import type { Entry } from '../types/index.js';

export const DEFAULT_RECENCY_WINDOW_HOURS = 48;

/**
 * Keep entries published strictly after `now - windowHours`. Entries without a
 * usable publish time are dropped: their recency cannot be checked.
 */
export function filterRecentNews(
    entries: Entry[],
    now: Date = new Date(),
    windowHours: number = DEFAULT_RECENCY_WINDOW_HOURS
): Entry[] {
    const cutoff = now.getTime() - windowHours * 60 * 60 * 1000;
    return entries.filter(entry => {
        const published = entry.published?.getTime();
        if (published === undefined || isNaN(published)) return false;
        return published > cutoff;
    });
}
