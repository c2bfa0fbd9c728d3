import { describe, it, expect } from 'vitest';
import { filterRecentNews } from './recency.js';
import type { Entry } from '../types/index.js';

const now = new Date('2026-10-18T12:00:00Z');
const hoursAgo = (h: number) => new Date(now.getTime() - h * 60 * 60 * 1000);

function entry(title: string, published?: Date): Entry {
    return { title, link: `https://news.example.com/${encodeURIComponent(title)}`, source: 'Example', ...(published ? { published } : {}) };
}

describe('filterRecentNews', () => {
    it('keeps entries inside the window and drops older ones', () => {
        const recent = entry('an hour old', hoursAgo(1));
        const stale = entry('three days old', hoursAgo(72));

        expect(filterRecentNews([recent, stale], now)).toEqual([recent]);
    });

    it('excludes an entry exactly on the window boundary', () => {
        const boundary = entry('boundary', hoursAgo(48));
        const inside = entry('just inside', new Date(hoursAgo(48).getTime() + 1));

        expect(filterRecentNews([boundary, inside], now).map(e => e.title)).toEqual(['just inside']);
    });

    it('drops entries without a publish time', () => {
        expect(filterRecentNews([entry('undated')], now)).toEqual([]);
    });

    it('drops entries whose date is invalid', () => {
        expect(filterRecentNews([entry('broken', new Date('not a date'))], now)).toEqual([]);
    });

    it('preserves input order', () => {
        const entries = [entry('c', hoursAgo(5)), entry('a', hoursAgo(30)), entry('b', hoursAgo(2))];

        expect(filterRecentNews(entries, now).map(e => e.title)).toEqual(['c', 'a', 'b']);
    });

    it('honours a custom window', () => {
        const entries = [entry('two hours', hoursAgo(2)), entry('six hours', hoursAgo(6))];

        expect(filterRecentNews(entries, now, 4).map(e => e.title)).toEqual(['two hours']);
    });
});
