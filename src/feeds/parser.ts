import Parser from 'rss-parser';
import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError } from 'axios';
import xml2js from 'xml2js';
import type { Entry, FeedFetchResult, FeedQuery, FeedSource } from '../types/index.js';
import { DEFAULT_FEED_TIMEOUT_MS, FEED_HEADERS, GOOGLE_NEWS_SEARCH_URL, buildSearchUrl } from './config.js';
import { log, errorMessage } from '../server/logging.js';
import { asRecord } from '../shared/guards.js';

// Google News puts the publisher in <source url="...">Name</source>
type SourceField = string | { _?: string; $?: { url?: string } };

type GoogleNewsItem = {
    source?: SourceField;
    published?: string;
};

const rssParser: Parser<Record<string, unknown>, GoogleNewsItem> = new Parser({
    customFields: {
        item: ['source', 'published']
    }
});

export const UNKNOWN_SOURCE = 'Unknown';

export interface RawFeedItem {
    title?: unknown;
    link?: unknown;
    isoDate?: unknown;
    pubDate?: unknown;
    published?: unknown;
    source?: unknown;
}

// xml2js wraps text in arrays and puts element text under '_' when attributes exist
function textOf(value: unknown): string {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.length > 0 ? textOf(value[0]) : '';
    const record = asRecord(value);
    if (record) {
        if (typeof record._ === 'string') return record._;
        const attrs = asRecord(record.$);
        if (attrs && typeof attrs.href === 'string') return attrs.href;
    }
    return '';
}

export function parsePublished(value: string): Date | undefined {
    if (!value.trim()) return undefined;
    const date = new Date(value);
    return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Convert one raw feed item into an Entry. Absent fields become empty/unknown;
 * items without a link are rejected with null.
 */
export function normalizeFeedItem(item: RawFeedItem): Entry | null {
    const link = textOf(item.link).trim();
    if (!link) return null;

    const dateText = textOf(item.isoDate) || textOf(item.pubDate) || textOf(item.published);
    const published = parsePublished(dateText);
    const source = textOf(item.source).trim();

    const entry: Entry = {
        title: textOf(item.title).trim(),
        link,
        source: source || UNKNOWN_SOURCE,
        ...(published ? { published } : {})
    };
    return entry;
}

function normalizeAll(items: RawFeedItem[]): Entry[] {
    const entries: Entry[] = [];
    for (const item of items) {
        const entry = normalizeFeedItem(item);
        if (entry) entries.push(entry);
    }
    return entries;
}

export async function parseWithRssParser(xml: string): Promise<Entry[]> {
    const feed = await rssParser.parseString(xml);
    return normalizeAll(feed.items);
}

// Fallback manual parser using xml2js (RSS channel items or Atom entries)
export async function parseManually(xml: string): Promise<Entry[]> {
    const parsed: unknown = await xml2js.parseStringPromise(xml);
    const root = asRecord(parsed);
    if (!root) throw new Error('Feed document is empty');

    let rawItems: unknown[] = [];
    const rss = asRecord(root.rss);
    const feed = asRecord(root.feed);
    if (rss) {
        const channels = Array.isArray(rss.channel) ? rss.channel : [];
        const channel = asRecord(channels[0]);
        if (channel && Array.isArray(channel.item)) rawItems = channel.item;
    } else if (feed) {
        if (Array.isArray(feed.entry)) rawItems = feed.entry;
    } else {
        throw new Error('Unrecognised feed format: expected <rss> or <feed>');
    }

    const items: RawFeedItem[] = [];
    for (const raw of rawItems) {
        const record = asRecord(raw);
        if (!record) continue;
        items.push({
            title: record.title,
            link: record.link ?? record.id,
            pubDate: record.pubDate ?? record.updated,
            published: record.published,
            source: record.source
        });
    }
    return normalizeAll(items);
}

/**
 * Parse feed XML: rss-parser first, xml2js when rss-parser rejects the document.
 */
export async function parseFeedXml(xml: string): Promise<Entry[]> {
    try {
        return await parseWithRssParser(xml);
    } catch (error) {
        try {
            return await parseManually(xml);
        } catch (fallbackError) {
            throw new Error(`RSS Parser failed: ${errorMessage(error)}. Manual parse failed: ${errorMessage(fallbackError)}`);
        }
    }
}

export interface GoogleNewsSourceOptions {
    baseUrl?: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
}

/**
 * Google News RSS search. Every failure is reported in the result instead of thrown.
 */
export class GoogleNewsSource implements FeedSource {
    private readonly http: AxiosInstance;
    private readonly baseUrl: string;

    constructor(options: GoogleNewsSourceOptions = {}) {
        this.baseUrl = options.baseUrl || GOOGLE_NEWS_SEARCH_URL;
        this.http = axios.create({
            timeout: options.timeoutMs ?? DEFAULT_FEED_TIMEOUT_MS,
            headers: FEED_HEADERS,
            responseType: 'text',
            adapter: options.adapter
        });
    }

    async search(query: FeedQuery): Promise<FeedFetchResult> {
        const url = buildSearchUrl(query, this.baseUrl);
        const started = Date.now();
        const meta = (fetchedRaw: number, kept: number) => ({ url, fetchedRaw, kept, durationMs: Date.now() - started });

        let body: string;
        try {
            const response = await this.http.get<string>(url);
            body = typeof response.data === 'string' ? response.data : String(response.data);
        } catch (err) {
            const httpStatus = isAxiosError(err) ? err.response?.status : undefined;
            const type = httpStatus ? 'http' : 'network';
            log('warn', 'Feed request failed', { url, httpStatus, error: errorMessage(err) });
            return {
                status: 'error',
                entries: [],
                error: { type, message: errorMessage(err), ...(httpStatus ? { httpStatus } : {}) },
                meta: meta(0, 0)
            };
        }

        try {
            const entries = await parseFeedXml(body);
            return { status: 'ok', entries, meta: meta(entries.length, entries.length) };
        } catch (err) {
            log('warn', 'Feed could not be parsed', { url, error: errorMessage(err) });
            return {
                status: 'error',
                entries: [],
                error: { type: 'parse', message: errorMessage(err) },
                meta: meta(0, 0)
            };
        }
    }
}
