import { describe, it, expect } from 'vitest';
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { MessageTooLongError, TelegramApiError, TelegramDelivery } from './telegram.js';

type Call = { url: string; baseURL: string; body: Record<string, unknown> };

function telegramAdapter(calls: Call[], reply: { status: number; data: unknown }): AxiosAdapter {
    return async (config: InternalAxiosRequestConfig) => {
        calls.push({ url: config.url ?? '', baseURL: config.baseURL ?? '', body: JSON.parse(String(config.data)) });
        const response = { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
        if (reply.status >= 400) {
            throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_REQUEST', config, null, response);
        }
        return response;
    };
}

describe('TelegramDelivery', () => {
    it('posts plain text to the bot sendMessage method', async () => {
        const calls: Call[] = [];
        const delivery = new TelegramDelivery('test-token', { adapter: telegramAdapter(calls, { status: 200, data: { ok: true, result: {} } }) });

        await delivery.sendMessage(42, 'hello');

        expect(calls).toEqual([{
            url: 'sendMessage',
            baseURL: 'https://api.telegram.org/bottest-token/',
            body: { chat_id: 42, text: 'hello' }
        }]);
    });

    it('sets MarkdownV2 and disables previews when asked', async () => {
        const calls: Call[] = [];
        const delivery = new TelegramDelivery('test-token', {
            apiBaseUrl: 'http://telegram.test',
            adapter: telegramAdapter(calls, { status: 200, data: { ok: true, result: {} } })
        });

        await delivery.sendMessage('@channel', '*bold*', { markdown: true, disablePreview: true });

        expect(calls[0].baseURL).toBe('http://telegram.test/bottest-token/');
        expect(calls[0].body).toEqual({
            chat_id: '@channel',
            text: '*bold*',
            parse_mode: 'MarkdownV2',
            disable_web_page_preview: true
        });
    });

    it('refuses messages over the Telegram limit without calling the API', async () => {
        const calls: Call[] = [];
        const delivery = new TelegramDelivery('test-token', { adapter: telegramAdapter(calls, { status: 200, data: { ok: true } }) });

        await expect(delivery.sendMessage(42, 'x'.repeat(4097))).rejects.toBeInstanceOf(MessageTooLongError);
        await expect(delivery.sendMessage(42, 'x'.repeat(4096))).resolves.toBeUndefined();
        expect(calls).toHaveLength(1);
    });

    it('surfaces the API description on an HTTP error', async () => {
        const delivery = new TelegramDelivery('test-token', {
            adapter: telegramAdapter([], {
                status: 400,
                data: { ok: false, error_code: 400, description: "Bad Request: can't parse entities" }
            })
        });

        const error = await delivery.sendMessage(42, 'oops.', { markdown: true }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TelegramApiError);
        expect(error).toMatchObject({
            message: "Telegram sendMessage failed (400): Bad Request: can't parse entities",
            errorCode: 400
        });
    });

    it('treats ok: false as a failure', async () => {
        const delivery = new TelegramDelivery('test-token', {
            adapter: telegramAdapter([], { status: 200, data: { ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' } })
        });

        await expect(delivery.sendMessage(42, 'hi')).rejects.toMatchObject({
            name: 'TelegramApiError',
            message: 'Telegram sendMessage failed: Forbidden: bot was blocked by the user',
            errorCode: 403
        });
    });
});
