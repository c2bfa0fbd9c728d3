import type { ClusterMap, Entry } from '../types/index.js';
import { escapeLinkUrl, escapeMarkdownV2, truncate } from '../shared/markdown.js';

export interface FormatOptions {
    maxClusters?: number;
    /** Longest page, in characters. Kept below Telegram's 4096 ceiling. */
    messageBudget?: number;
}

export const DEFAULT_MAX_CLUSTERS = 10;
export const DEFAULT_MESSAGE_BUDGET = 3900;

const HEADING_MAX = 120;
const TITLE_MAX = 100;
const SOURCE_MAX = 30;
const ARTICLES_PER_CLUSTER = 5;
const MIXED_ARTICLES_MAX = 10;
const RULE = '─'.repeat(35) + '\n\n';

export const NO_CLUSTERS_MESSAGE = escapeMarkdownV2('No clustered news found.');
export const NO_NEWS_MESSAGE = escapeMarkdownV2('No news found for your query.');

// Format: • Title (linked) then "via Source"
function renderArticle(article: Entry): string {
    const title = escapeMarkdownV2(truncate(article.title, TITLE_MAX));
    const url = escapeLinkUrl(article.link);
    const source = escapeMarkdownV2(truncate(article.source, SOURCE_MAX));
    return `  • [${title}](${url})\n    _via ${source}_\n\n`;
}

function renderMoreNote(remaining: number, what: string): string {
    return `  _\\.\\.\\.and ${remaining} more ${what}_\n\n`;
}

function renderClusterBlock(articles: Entry[]): string {
    const heading = escapeMarkdownV2(truncate(articles[0].title, HEADING_MAX));
    let text = `*${heading}*\n\n`;
    for (const article of articles.slice(0, ARTICLES_PER_CLUSTER)) {
        text += renderArticle(article);
    }
    if (articles.length > ARTICLES_PER_CLUSTER) {
        text += renderMoreNote(articles.length - ARTICLES_PER_CLUSTER, 'related articles');
    }
    return text + RULE;
}

function renderMixedBlock(singles: Entry[]): string {
    let text = `*${escapeMarkdownV2('Mixed Articles')}*\n\n`;
    for (const article of singles.slice(0, MIXED_ARTICLES_MAX)) {
        text += renderArticle(article);
    }
    if (singles.length > MIXED_ARTICLES_MAX) {
        text += renderMoreNote(singles.length - MIXED_ARTICLES_MAX, 'articles');
    }
    return text + RULE;
}

/**
 * Split a block longer than the budget on line boundaries. A single line that is
 * still too long is cut at the budget, never between a backslash and the character it escapes.
 */
export function splitOversized(block: string, budget: number): string[] {
    if (block.length <= budget) return [block];

    const pieces: string[] = [];
    let current = '';
    for (const line of block.split(/(?<=\n)/)) {
        if (current.length + line.length <= budget) {
            current += line;
            continue;
        }
        if (current) {
            pieces.push(current);
            current = '';
        }
        let rest = line;
        while (rest.length > budget) {
            let cut = budget;
            let backslashes = 0;
            while (backslashes < cut && rest[cut - 1 - backslashes] === '\\') backslashes++;
            // An odd run ends with an unpaired escape
            if (backslashes % 2 === 1 && cut > 1) cut--;
            pieces.push(rest.slice(0, cut));
            rest = rest.slice(cut);
        }
        current = rest;
    }
    if (current) pieces.push(current);
    return pieces;
}

/** Pack rendered blocks into pages of at most `budget` characters, in order. */
export function paginate(blocks: string[], budget: number): string[] {
    const pages: string[] = [];
    let current = '';

    for (const block of blocks) {
        for (const piece of splitOversized(block, budget)) {
            if (current && current.length + piece.length > budget) {
                pages.push(current);
                current = piece;
            } else {
                current += piece;
            }
        }
    }

    if (current) pages.push(current);
    return pages;
}

/**
 * Render clusters as Telegram MarkdownV2 pages: multi-article clusters largest first,
 * then one "Mixed Articles" section for everything that did not cluster.
 */
export function formatClustersForTelegram(clusters: ClusterMap, options: FormatOptions = {}): string[] {
    const maxClusters = options.maxClusters ?? DEFAULT_MAX_CLUSTERS;
    const budget = options.messageBudget ?? DEFAULT_MESSAGE_BUDGET;

    const sorted = Array.from(clusters.values()).sort((a, b) => b.length - a.length);
    const multi = sorted.filter(articles => articles.length > 1);
    const singles = sorted.filter(articles => articles.length === 1).map(articles => articles[0]);

    if (multi.length === 0) {
        return [NO_CLUSTERS_MESSAGE];
    }

    const blocks = multi.slice(0, maxClusters).map(renderClusterBlock);
    if (singles.length > 0) {
        blocks.push(renderMixedBlock(singles));
    }

    const pages = paginate(blocks, budget);
    return pages.length > 0 ? pages : [NO_NEWS_MESSAGE];
}
