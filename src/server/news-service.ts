import type { ChatId, MessageDelivery, NewsRequest, PreferenceStore } from '../types/index.js';
import { type PipelineDeps, runNewsPipeline } from '../feeds/pipeline.js';
import { escapeMarkdownV2 } from '../shared/markdown.js';
import { NO_NEWS_MESSAGE } from './telegram-format.js';
import { log, errorMessage } from './logging.js';

export const NOTHING_FETCHED_MESSAGE = `❌ ${escapeMarkdownV2('No news articles found for your query.')}`;
export const ANALYZING_MESSAGE = '✅ Fetched articles. Analyzing...';

// dd-mm-yyyy in UTC
export function formatDigestDate(date: Date): string {
    const dd = String(date.getUTCDate()).padStart(2, '0');
    const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
    return `${dd}-${mm}-${date.getUTCFullYear()}`;
}

export function digestHeader(date: Date): string {
    return `🗞 *${escapeMarkdownV2(`News Clusters for ${formatDigestDate(date)}`)}*\n\n`;
}

export function dailyGreeting(topic: string): string {
    return `🌅 ${escapeMarkdownV2("Good morning! Here's your daily news about")} *${escapeMarkdownV2(topic)}*`;
}

export type DailyRunSummary = {
    attempted: number;
    failed: number;
};

export class NewsService {
    constructor(
        private readonly delivery: MessageDelivery,
        private readonly pipeline: PipelineDeps,
        private readonly store: PreferenceStore
    ) {}

    private sendMarkdown(chatId: ChatId, text: string): Promise<void> {
        return this.delivery.sendMessage(chatId, text, { markdown: true, disablePreview: true });
    }

    /**
     * Run the pipeline for one request and send the outcome to the chat.
     * Errors are reported to the user, not rethrown and not retried; the result is false then.
     */
    async processAndSendNews(chatId: ChatId, request: NewsRequest): Promise<boolean> {
        try {
            log('info', 'Processing news request', { chatId, ...request });

            const result = await runNewsPipeline(request, this.pipeline, {
                onFetched: () => this.delivery.sendMessage(chatId, ANALYZING_MESSAGE)
            });

            if (result.status === 'empty') {
                await this.sendMarkdown(chatId, result.stage === 'fetch' ? NOTHING_FETCHED_MESSAGE : NO_NEWS_MESSAGE);
                return true;
            }

            const now = this.pipeline.now ? this.pipeline.now() : new Date();
            await this.sendMarkdown(chatId, digestHeader(now));
            for (const page of result.pages) {
                await this.sendMarkdown(chatId, page);
            }

            log('info', 'News digest sent', { chatId, pages: result.pages.length, ...result.stats });
            return true;
        } catch (err) {
            log('error', 'Error processing news', { chatId, error: errorMessage(err) });
            try {
                await this.delivery.sendMessage(chatId, `❌ An error occurred: ${errorMessage(err)}`);
            } catch (notifyErr) {
                log('error', 'Could not report failure to chat', { chatId, error: errorMessage(notifyErr) });
            }
            return false;
        }
    }

    /**
     * Send today's digest to every user with automatic updates enabled.
     * One user's failure does not stop the rest.
     */
    async sendDailyUpdates(): Promise<DailyRunSummary> {
        const users = await this.store.listAutomatic();
        log('info', 'Starting daily news updates', { users: users.length });

        let failed = 0;
        for (const user of users) {
            try {
                await this.sendMarkdown(user.id, dailyGreeting(user.topic));
                const sent = await this.processAndSendNews(user.id, {
                    topic: user.topic,
                    location: user.location,
                    language: user.language
                });
                if (!sent) failed++;
            } catch (err) {
                failed++;
                log('error', 'Failed to send daily update', { userId: user.id, error: errorMessage(err) });
            }
        }

        log('info', 'Daily news updates finished', { attempted: users.length, failed });
        return { attempted: users.length, failed };
    }
}
