/**
 * Sentence encoders for the semantic similarity engine.
 *
 * An encoder is heavyweight to bring up and stateless afterwards, so it is wrapped in an
 * {@link EncoderHandle} that is created once at startup, injected where needed and loaded
 * at most once for the life of the process.
 */

import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError } from 'axios';
import type { EmbeddingConfig } from '../shared/config.js';
import { log } from '../server/logging.js';

export type EmbeddingVector = number[];

export interface SentenceEncoder {
    /** Identifier of the model behind this encoder. */
    readonly model: string;
    /** Encode texts into vectors of one fixed dimension, in input order. */
    encode(texts: string[]): Promise<EmbeddingVector[]>;
}

/**
 * Lazily-initialised, shared encoder. Concurrent first callers share a single load.
 * A failed load is remembered; later calls see the same failure instead of retrying.
 */
export class EncoderHandle {
    private pending: Promise<SentenceEncoder> | null = null;

    constructor(private readonly loader: () => Promise<SentenceEncoder>) {}

    get(): Promise<SentenceEncoder> {
        if (!this.pending) {
            this.pending = this.loader();
        }
        return this.pending;
    }

    get started(): boolean {
        return this.pending !== null;
    }
}

/** Response shape of an OpenAI-compatible embeddings endpoint. */
interface EmbeddingResponse {
    data: { embedding: number[]; index: number }[];
    model: string;
}

export interface OpenAIEncoderOptions {
    adapter?: AxiosAdapter;
}

class OpenAIEncoder implements SentenceEncoder {
    constructor(
        readonly model: string,
        private readonly http: AxiosInstance
    ) {}

    async encode(texts: string[]): Promise<EmbeddingVector[]> {
        if (texts.length === 0) return [];
        // The endpoint rejects empty strings
        const input = texts.map(t => (t.trim() ? t : ' '));

        let json: EmbeddingResponse;
        try {
            const response = await this.http.post<EmbeddingResponse>('embeddings', { input, model: this.model });
            json = response.data;
        } catch (err) {
            if (isAxiosError(err) && err.response) {
                throw new Error(`Embedding request failed (${err.response.status}): ${JSON.stringify(err.response.data)}`);
            }
            throw err;
        }

        if (!Array.isArray(json?.data) || json.data.length !== texts.length) {
            throw new Error(`Unexpected embedding response: expected ${texts.length} vectors`);
        }

        const byIndex = new Map<number, EmbeddingVector>();
        for (const item of json.data) {
            byIndex.set(item.index, item.embedding);
        }
        return texts.map((_, i) => {
            const vector = byIndex.get(i);
            if (!vector) throw new Error(`Unexpected embedding response: missing vector ${i}`);
            return vector;
        });
    }
}

/**
 * Loader for an encoder backed by an OpenAI-compatible `/embeddings` API.
 * Loading sends one probe request so an unreachable or misconfigured endpoint
 * is discovered at startup rather than in the middle of a request.
 */
export function createOpenAIEncoderLoader(
    config: EmbeddingConfig,
    options: OpenAIEncoderOptions = {}
): () => Promise<SentenceEncoder> {
    return async () => {
        const baseURL = config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`;
        const http = axios.create({
            baseURL,
            timeout: config.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${config.apiKey}`
            },
            adapter: options.adapter
        });
        const encoder = new OpenAIEncoder(config.model, http);
        const [probe] = await encoder.encode(['news']);
        log('info', 'Sentence encoder loaded', { model: config.model, dimensions: probe.length });
        return encoder;
    };
}
