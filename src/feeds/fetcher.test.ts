import { describe, it, expect } from 'vitest';
import { dedupeByLink, fetchRecentNews } from './fetcher.js';
import type { Entry, FeedFetchResult, FeedQuery, FeedSource } from '../types/index.js';

function ok(entries: Entry[]): FeedFetchResult {
    return { status: 'ok', entries, meta: { url: 'stub', fetchedRaw: entries.length, kept: entries.length, durationMs: 0 } };
}

function failed(message: string): FeedFetchResult {
    return { status: 'error', entries: [], error: { type: 'parse', message }, meta: { url: 'stub', fetchedRaw: 0, kept: 0, durationMs: 0 } };
}

class StubSource implements FeedSource {
    readonly queries: FeedQuery[] = [];

    constructor(private readonly respond: (query: FeedQuery, call: number) => FeedFetchResult | Promise<FeedFetchResult>) {}

    async search(query: FeedQuery): Promise<FeedFetchResult> {
        this.queries.push(query);
        return this.respond(query, this.queries.length - 1);
    }
}

const request = { topic: 'solar power', location: 'DE', language: 'de' };

describe('fetchRecentNews', () => {
    it('queries the user combination and both fallbacks in order', async () => {
        const source = new StubSource(() => ok([]));
        await fetchRecentNews(request, source);

        expect(source.queries).toEqual([
            { query: 'solar power', location: 'DE', language: 'de' },
            { query: 'solar power', location: 'US', language: 'de' },
            { query: 'solar power', location: 'DE', language: 'en' }
        ]);
    });

    it('keeps the first entry when three queries return the same link', async () => {
        const source = new StubSource((_, call) => ok([
            { title: `Headline from query ${call}`, link: 'https://news.example.com/a/1', source: `Source ${call}` }
        ]));

        const entries = await fetchRecentNews(request, source);

        expect(entries).toEqual([
            { title: 'Headline from query 0', link: 'https://news.example.com/a/1', source: 'Source 0' }
        ]);
    });

    it('merges in query order even when later queries finish first', async () => {
        const delays = [30, 10, 0];
        const source = new StubSource(async (_, call) => {
            await new Promise(resolve => setTimeout(resolve, delays[call]));
            return ok([
                { title: `shared ${call}`, link: 'https://news.example.com/shared', source: 'S' },
                { title: `own ${call}`, link: `https://news.example.com/own-${call}`, source: 'S' }
            ]);
        });

        const entries = await fetchRecentNews(request, source);

        expect(entries.map(e => e.title)).toEqual(['shared 0', 'own 0', 'own 1', 'own 2']);
    });

    it('ignores a failed query and keeps the others', async () => {
        const source = new StubSource((_, call) => call === 1
            ? failed('bad xml')
            : ok([{ title: `t${call}`, link: `https://news.example.com/${call}`, source: 'S' }]));

        const entries = await fetchRecentNews(request, source);

        expect(entries.map(e => e.link)).toEqual(['https://news.example.com/0', 'https://news.example.com/2']);
    });

    it('returns an empty list when every query fails or throws', async () => {
        const source = new StubSource((_, call) => {
            if (call === 0) throw new Error('socket hang up');
            return failed('timeout');
        });

        await expect(fetchRecentNews(request, source)).resolves.toEqual([]);
    });
});

describe('dedupeByLink', () => {
    it('treats links differing only in tracking parameters or fragment as one', () => {
        const entries = dedupeByLink([
            [{ title: 'first', link: 'https://news.example.com/story?id=7&utm_source=rss', source: 'A' }],
            [{ title: 'second', link: 'https://news.example.com/story?id=7#comments', source: 'B' }]
        ]);

        expect(entries).toHaveLength(1);
        expect(entries[0].title).toBe('first');
    });

    it('keeps links that differ only in case apart', () => {
        const entries = dedupeByLink([[
            { title: 'a', link: 'https://news.example.com/articles/CBMiAbC', source: 'A' },
            { title: 'b', link: 'https://news.example.com/articles/CBMiabc', source: 'A' }
        ]]);

        expect(entries).toHaveLength(2);
    });
});
