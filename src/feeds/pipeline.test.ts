import { describe, it, expect } from 'vitest';
import { runNewsPipeline, type PipelineDeps } from './pipeline.js';
import { LexicalSimilarity, pairwiseMatrix, type SimilarityEngine } from '../filter/similarity.js';
import type { Entry, FeedFetchResult, FeedSource, SimilarityMatrix } from '../types/index.js';

const now = new Date('2026-10-18T07:00:00Z');
const hoursAgo = (h: number) => new Date(now.getTime() - h * 60 * 60 * 1000);

class FixedSource implements FeedSource {
    constructor(private readonly entries: Entry[]) {}

    async search(): Promise<FeedFetchResult> {
        return {
            status: 'ok',
            entries: this.entries,
            meta: { url: 'fixed', fetchedRaw: this.entries.length, kept: this.entries.length, durationMs: 0 }
        };
    }
}

// Every title is a perfect match for every other
const identical: SimilarityEngine = {
    name: 'semantic',
    async similarity(titles: string[]): Promise<SimilarityMatrix> {
        return pairwiseMatrix(titles.length, () => 1);
    }
};

function deps(entries: Entry[]): PipelineDeps {
    return { source: new FixedSource(entries), engine: new LexicalSimilarity(), now: () => now };
}

const request = { topic: 'weather', location: 'US', language: 'en' };

describe('runNewsPipeline', () => {
    it('fetches, filters, clusters and formats', async () => {
        const entries: Entry[] = [
            { title: 'Rain expected tomorrow', link: 'https://news.example.com/1', source: 'Met', published: hoursAgo(2) },
            { title: 'Tomorrow rain expected', link: 'https://news.example.com/2', source: 'Herald', published: hoursAgo(3) },
            { title: 'Stock market rallies', link: 'https://news.example.com/3', source: 'Ticker', published: hoursAgo(4) },
            { title: 'Last week in rain', link: 'https://news.example.com/4', source: 'Met', published: hoursAgo(72) }
        ];
        const fetchedCounts: number[] = [];

        const result = await runNewsPipeline(request, deps(entries), {
            onFetched: async count => {
                fetchedCounts.push(count);
            }
        });

        expect(fetchedCounts).toEqual([4]);
        if (result.status !== 'ok') throw new Error(`expected ok, got ${result.status}`);
        expect(result.stats).toEqual({ fetched: 4, recent: 3, clusters: 2, multiArticleClusters: 1, engine: 'lexical' });
        expect(result.pages).toHaveLength(1);
        expect(result.pages[0].startsWith('*Rain expected tomorrow*\n\n')).toBe(true);
        expect(result.pages[0]).toContain('*Mixed Articles*\n\n  • [Stock market rallies](https://news.example.com/3)');
        expect(result.pages[0]).not.toContain('Last week in rain');
    });

    it('stops at the fetch stage when nothing was found', async () => {
        let notified = false;

        const result = await runNewsPipeline(request, deps([]), {
            onFetched: async () => {
                notified = true;
            }
        });

        expect(result).toEqual({ status: 'empty', stage: 'fetch', fetched: 0 });
        expect(notified).toBe(false);
    });

    it('stops at the filter stage when everything is too old', async () => {
        const result = await runNewsPipeline(request, deps([
            { title: 'Old news', link: 'https://news.example.com/old', source: 'Archive', published: hoursAgo(100) },
            { title: 'Undated news', link: 'https://news.example.com/undated', source: 'Archive' }
        ]));

        expect(result).toEqual({ status: 'empty', stage: 'filter', fetched: 2 });
    });

    it('passes the format options through', async () => {
        const entries: Entry[] = Array.from({ length: 4 }, (_, i) => ({
            title: `Rain expected tomorrow, update ${i}!`,
            link: `https://news.example.com/r${i}`,
            source: 'Met',
            published: hoursAgo(1)
        }));

        const result = await runNewsPipeline(request, { ...deps(entries), engine: identical, format: { messageBudget: 120 } });

        if (result.status !== 'ok') throw new Error(`expected ok, got ${result.status}`);
        expect(result.stats.engine).toBe('semantic');
        expect(result.stats.multiArticleClusters).toBe(1);
        expect(result.pages.length).toBeGreaterThan(1);
        for (const page of result.pages) expect(page.length).toBeLessThanOrEqual(120);
    });
});
