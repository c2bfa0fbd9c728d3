import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError } from 'axios';
import type { ChatId, MessageDelivery, SendOptions } from '../types/index.js';
import { TELEGRAM_MESSAGE_LIMIT } from '../shared/config.js';

// =============================================================================
// TELEGRAM BOT API - sendMessage
// =============================================================================

export class TelegramApiError extends Error {
    constructor(message: string, readonly errorCode?: number) {
        super(message);
        this.name = 'TelegramApiError';
    }
}

export class MessageTooLongError extends Error {
    constructor(readonly length: number, readonly limit: number) {
        super(`Message is ${length} characters, Telegram accepts at most ${limit}`);
        this.name = 'MessageTooLongError';
    }
}

interface TelegramResponse {
    ok: boolean;
    description?: string;
    error_code?: number;
}

export interface TelegramDeliveryOptions {
    apiBaseUrl?: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
}

export class TelegramDelivery implements MessageDelivery {
    private readonly http: AxiosInstance;

    constructor(token: string, options: TelegramDeliveryOptions = {}) {
        const base = options.apiBaseUrl || 'https://api.telegram.org';
        this.http = axios.create({
            baseURL: `${base}/bot${token}/`,
            timeout: options.timeoutMs ?? 15000,
            headers: { 'Content-Type': 'application/json' },
            adapter: options.adapter
        });
    }

    async sendMessage(chatId: ChatId, text: string, options: SendOptions = {}): Promise<void> {
        if (text.length > TELEGRAM_MESSAGE_LIMIT) {
            throw new MessageTooLongError(text.length, TELEGRAM_MESSAGE_LIMIT);
        }

        const payload = {
            chat_id: chatId,
            text,
            ...(options.markdown ? { parse_mode: 'MarkdownV2' } : {}),
            ...(options.disablePreview ? { disable_web_page_preview: true } : {})
        };

        let body: TelegramResponse;
        try {
            const response = await this.http.post<TelegramResponse>('sendMessage', payload);
            body = response.data;
        } catch (err) {
            if (isAxiosError<TelegramResponse>(err) && err.response) {
                const data = err.response.data;
                throw new TelegramApiError(
                    `Telegram sendMessage failed (${err.response.status}): ${data?.description ?? err.message}`,
                    data?.error_code ?? err.response.status
                );
            }
            throw new TelegramApiError(`Telegram sendMessage failed: ${err instanceof Error ? err.message : String(err)}`);
        }

        if (!body || !body.ok) {
            throw new TelegramApiError(`Telegram sendMessage failed: ${body?.description ?? 'no response body'}`, body?.error_code);
        }
    }
}
