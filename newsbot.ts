#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { loadConfig, requireTelegramToken, type BotConfig, ConfigError } from './src/shared/config.js';
import { GoogleNewsSource } from './src/feeds/parser.js';
import { isSupportedLanguage, isSupportedLocation, DEFAULT_LANGUAGE, DEFAULT_REGION, LANGUAGES, LOCATIONS } from './src/feeds/config.js';
import { EncoderHandle, createOpenAIEncoderLoader } from './src/filter/embeddings.js';
import { selectSimilarityEngine } from './src/filter/similarity.js';
import { JsonPreferenceStore } from './src/store/storage.js';
import { TelegramDelivery } from './src/server/telegram.js';
import { NewsService } from './src/server/news-service.js';
import { startDailySchedule } from './src/server/scheduler.js';
import { describeSettings, setDailyUpdates, subscribeUser, type CommandResult } from './src/server/commands.js';
import { log, errorMessage } from './src/server/logging.js';

const USAGE = `Usage:
  newsbot news --chat <id> --topic <topic> [--location US] [--language en]
  newsbot subscribe --chat <id> --topic <topic> [--location US] [--language en] [--automatic]
  newsbot settings --chat <id>
  newsbot automatic --chat <id> (--on | --off)
  newsbot schedule`;

type CliOptions = {
    chat?: string;
    topic?: string;
    location?: string;
    language?: string;
    automatic?: boolean;
    on?: boolean;
    off?: boolean;
};

function parseCli(argv: string[]): { command: string | undefined; options: CliOptions } {
    const { positionals, values } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            chat: { type: 'string' },
            topic: { type: 'string' },
            location: { type: 'string' },
            language: { type: 'string' },
            automatic: { type: 'boolean' },
            on: { type: 'boolean' },
            off: { type: 'boolean' }
        }
    });
    return { command: positionals[0], options: values };
}

function requireChatId(options: CliOptions): number {
    const chatId = Number(options.chat);
    if (!options.chat || !Number.isInteger(chatId)) {
        throw new ConfigError('--chat must be a numeric Telegram chat id');
    }
    return chatId;
}

function requireRequest(options: CliOptions) {
    const topic = options.topic?.trim();
    if (!topic) throw new ConfigError('--topic is required');

    const location = (options.location || DEFAULT_REGION).toUpperCase();
    const language = (options.language || DEFAULT_LANGUAGE).toLowerCase();
    if (!isSupportedLocation(location)) {
        throw new ConfigError(`Unsupported location "${location}". Choose one of: ${Object.keys(LOCATIONS).join(', ')}`);
    }
    if (!isSupportedLanguage(language)) {
        throw new ConfigError(`Unsupported language "${language}". Choose one of: ${Object.keys(LANGUAGES).join(', ')}`);
    }
    return { topic, location, language };
}

function requireToggle(options: CliOptions): boolean {
    if (options.on === options.off) {
        throw new ConfigError('Pass exactly one of --on or --off');
    }
    return options.on === true;
}

function report(result: CommandResult): void {
    if (result.ok) {
        console.log(result.message);
    } else {
        console.error(result.message);
        process.exitCode = 1;
    }
}

async function createService(config: BotConfig, store: JsonPreferenceStore): Promise<NewsService> {
    const delivery = new TelegramDelivery(requireTelegramToken(config));
    const encoder = config.embedding ? new EncoderHandle(createOpenAIEncoderLoader(config.embedding)) : null;
    const engine = await selectSimilarityEngine(encoder);

    return new NewsService(delivery, {
        source: new GoogleNewsSource({ baseUrl: config.feed.baseUrl, timeoutMs: config.feed.timeoutMs }),
        engine,
        similarityThreshold: config.similarityThreshold,
        recencyWindowHours: config.recencyWindowHours,
        format: { maxClusters: config.maxClusters, messageBudget: config.messageBudget }
    }, store);
}

async function main(): Promise<void> {
    const { command, options } = parseCli(process.argv.slice(2));
    const config = loadConfig();
    const store = new JsonPreferenceStore(config.preferencesFile);

    switch (command) {
        case 'news': {
            const chatId = requireChatId(options);
            const request = requireRequest(options);
            const service = await createService(config, store);
            const sent = await service.processAndSendNews(chatId, request);
            if (!sent) process.exitCode = 1;
            break;
        }
        case 'subscribe': {
            const chatId = requireChatId(options);
            const request = requireRequest(options);
            report(await subscribeUser(store, chatId, request, options.automatic ?? false));
            break;
        }
        case 'settings':
            report(await describeSettings(store, requireChatId(options)));
            break;
        case 'automatic': {
            const chatId = requireChatId(options);
            report(await setDailyUpdates(store, chatId, requireToggle(options)));
            break;
        }
        case 'schedule': {
            const service = await createService(config, store);
            const task = startDailySchedule(service, config.schedule);
            const stop = () => {
                task.stop();
                log('info', 'Scheduler stopped');
                process.exit(0);
            };
            process.on('SIGINT', stop);
            process.on('SIGTERM', stop);
            break;
        }
        default:
            console.error(USAGE);
            process.exitCode = 1;
    }
}

main().catch(err => {
    log('error', 'newsbot failed', { error: errorMessage(err) });
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
});
