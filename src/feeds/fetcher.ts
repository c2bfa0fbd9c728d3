import type { Entry, FeedFetchResult, FeedQuery, FeedSource, NewsRequest } from '../types/index.js';
import { buildFeedQueries } from './config.js';
import { canonicalLink } from '../shared/url-utils.js';
import { log, errorMessage } from '../server/logging.js';

/**
 * Merge entry lists in order, keeping the first entry seen for each canonical link.
 */
export function dedupeByLink(batches: Entry[][]): Entry[] {
    const seen = new Set<string>();
    const merged: Entry[] = [];

    for (const batch of batches) {
        for (const entry of batch) {
            const key = canonicalLink(entry.link);
            if (!key || seen.has(key)) continue;
            seen.add(key);
            merged.push(entry);
        }
    }

    return merged;
}

async function safeSearch(source: FeedSource, query: FeedQuery): Promise<FeedFetchResult> {
    try {
        return await source.search(query);
    } catch (err) {
        // Sources report their own failures; this covers one that throws anyway
        log('warn', 'Feed source threw', { ...query, error: errorMessage(err) });
        return {
            status: 'error',
            entries: [],
            error: { type: 'network', message: errorMessage(err) },
            meta: { url: '', fetchedRaw: 0, kept: 0, durationMs: 0 }
        };
    }
}

/**
 * Search the topic for the user's (location, language) plus the two fallback combinations,
 * and merge the results. Queries run concurrently; the merge follows query order.
 * Failed queries contribute nothing, so the result may be empty but is never an error.
 */
export async function fetchRecentNews(request: NewsRequest, source: FeedSource): Promise<Entry[]> {
    const queries = buildFeedQueries(request);
    const results = await Promise.all(queries.map(query => safeSearch(source, query)));

    const failed = results.filter(r => r.status === 'error').length;
    if (failed === results.length) {
        log('warn', 'All feed queries failed', { topic: request.topic, location: request.location, language: request.language });
    }

    const entries = dedupeByLink(results.map(r => r.entries));
    const fetchedRaw = results.reduce((sum, r) => sum + r.entries.length, 0);

    log('info', 'Fetched news', {
        topic: request.topic,
        queries: queries.length,
        failed,
        fetchedRaw,
        kept: entries.length
    });

    return entries;
}
