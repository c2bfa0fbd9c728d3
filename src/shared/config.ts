import cron from 'node-cron';
import { DEFAULT_FEED_TIMEOUT_MS, GOOGLE_NEWS_SEARCH_URL } from '../feeds/config.js';

// Telegram rejects messages above this length
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface EmbeddingConfig {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
}

export interface BotConfig {
    telegramToken: string;
    preferencesFile: string;
    similarityThreshold: number;
    maxClusters: number;
    messageBudget: number;
    recencyWindowHours: number;
    feed: {
        baseUrl: string;
        timeoutMs: number;
    };
    schedule: {
        cron: string;
        timezone: string;
    };
    embedding: EmbeddingConfig | null;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number, integer: boolean): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
        throw new ConfigError(`${name} must be ${integer ? 'an integer' : 'a number'}, got "${raw}"`);
    }
    return value;
}

/**
 * Build the bot configuration from environment variables.
 * Only values that are present are validated; missing ones fall back to defaults.
 */
export function loadConfig(env: Env = process.env): BotConfig {
    const similarityThreshold = readNumber(env, 'SIMILARITY_THRESHOLD', 0.5, false);
    if (similarityThreshold <= 0 || similarityThreshold > 1) {
        throw new ConfigError(`SIMILARITY_THRESHOLD must be in (0, 1], got ${similarityThreshold}`);
    }

    const maxClusters = readNumber(env, 'MAX_CLUSTERS', 10, true);
    if (maxClusters < 1) {
        throw new ConfigError(`MAX_CLUSTERS must be at least 1, got ${maxClusters}`);
    }

    const messageBudget = readNumber(env, 'MESSAGE_BUDGET', 3900, true);
    if (messageBudget < 1 || messageBudget > TELEGRAM_MESSAGE_LIMIT) {
        throw new ConfigError(`MESSAGE_BUDGET must be between 1 and ${TELEGRAM_MESSAGE_LIMIT}, got ${messageBudget}`);
    }

    const recencyWindowHours = readNumber(env, 'RECENCY_WINDOW_HOURS', 48, false);
    if (recencyWindowHours <= 0) {
        throw new ConfigError(`RECENCY_WINDOW_HOURS must be positive, got ${recencyWindowHours}`);
    }

    const dailyCron = env.DAILY_CRON || '0 7 * * *';
    if (!cron.validate(dailyCron)) {
        throw new ConfigError(`DAILY_CRON is not a valid cron expression: "${dailyCron}"`);
    }

    const embeddingKey = env.EMBEDDING_API_KEY || '';

    return {
        telegramToken: env.TELEGRAM_TOKEN || env.TOKEN || '',
        preferencesFile: env.PREFERENCES_FILE || 'preferences.json',
        similarityThreshold,
        maxClusters,
        messageBudget,
        recencyWindowHours,
        feed: {
            baseUrl: env.FEED_BASE_URL || GOOGLE_NEWS_SEARCH_URL,
            timeoutMs: readNumber(env, 'FEED_TIMEOUT_MS', DEFAULT_FEED_TIMEOUT_MS, true)
        },
        schedule: {
            cron: dailyCron,
            timezone: env.DAILY_TIMEZONE || 'UTC'
        },
        embedding: embeddingKey
            ? {
                apiKey: embeddingKey,
                baseUrl: env.EMBEDDING_API_URL || 'https://api.openai.com/v1',
                model: env.EMBEDDING_MODEL || 'text-embedding-3-small',
                timeoutMs: readNumber(env, 'EMBEDDING_TIMEOUT_MS', 30000, true)
            }
            : null
    };
}

export function requireTelegramToken(config: BotConfig): string {
    if (!config.telegramToken) {
        throw new ConfigError('TELEGRAM_TOKEN environment variable not set');
    }
    return config.telegramToken;
}
