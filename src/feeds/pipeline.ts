/**
 * News digest pipeline for one request:
 *
 * 1. fetchRecentNews()            - three feed queries, merged and deduped by link
 * 2. filterRecentNews()           - drop anything outside the recency window
 * 3. clusterEntries()             - similarity matrix + average-linkage clustering
 * 4. formatClustersForTelegram()  - MarkdownV2 pages under the message budget
 *
 * Empty results are returned as values, not thrown; the caller decides what to tell the user.
 */

import type { FeedSource, NewsRequest } from '../types/index.js';
import { fetchRecentNews } from './fetcher.js';
import { DEFAULT_RECENCY_WINDOW_HOURS, filterRecentNews } from './recency.js';
import { clusterEntries, DEFAULT_SIMILARITY_THRESHOLD } from '../filter/cluster.js';
import type { SimilarityEngine } from '../filter/similarity.js';
import { formatClustersForTelegram, type FormatOptions } from '../server/telegram-format.js';
import { log } from '../server/logging.js';

export interface PipelineDeps {
    source: FeedSource;
    engine: SimilarityEngine;
    similarityThreshold?: number;
    recencyWindowHours?: number;
    format?: FormatOptions;
    now?: () => Date;
}

export interface PipelineHooks {
    /** Called once entries were fetched, before the slower analysis stages. */
    onFetched?: (count: number) => Promise<void>;
}

export type PipelineStats = {
    fetched: number;
    recent: number;
    clusters: number;
    multiArticleClusters: number;
    engine: SimilarityEngine['name'];
};

export type PipelineResult =
    | { status: 'empty'; stage: 'fetch' | 'filter'; fetched: number }
    | { status: 'ok'; pages: string[]; stats: PipelineStats };

export async function runNewsPipeline(
    request: NewsRequest,
    deps: PipelineDeps,
    hooks: PipelineHooks = {}
): Promise<PipelineResult> {
    const entries = await fetchRecentNews(request, deps.source);
    if (entries.length === 0) {
        log('info', 'Pipeline: no entries fetched', { topic: request.topic });
        return { status: 'empty', stage: 'fetch', fetched: 0 };
    }

    if (hooks.onFetched) {
        await hooks.onFetched(entries.length);
    }

    const now = deps.now ? deps.now() : new Date();
    const recent = filterRecentNews(entries, now, deps.recencyWindowHours ?? DEFAULT_RECENCY_WINDOW_HOURS);
    log('info', 'Pipeline: recency filter', { fetched: entries.length, recent: recent.length });
    if (recent.length === 0) {
        return { status: 'empty', stage: 'filter', fetched: entries.length };
    }

    const clusters = await clusterEntries(recent, deps.engine, deps.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD);
    const multiArticleClusters = Array.from(clusters.values()).filter(c => c.length > 1).length;
    log('info', 'Pipeline: clustered', { engine: deps.engine.name, clusters: clusters.size, multiArticleClusters });

    const pages = formatClustersForTelegram(clusters, deps.format);
    log('info', 'Pipeline: formatted', { pages: pages.length });

    return {
        status: 'ok',
        pages,
        stats: {
            fetched: entries.length,
            recent: recent.length,
            clusters: clusters.size,
            multiArticleClusters,
            engine: deps.engine.name
        }
    };
}
