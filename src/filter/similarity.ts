/**
 * Similarity engines: title list in, pairwise similarity matrix out.
 *
 * Two strategies share one interface. The strategy is chosen once at startup by
 * {@link selectSimilarityEngine}; the clusterer never knows which one it is using.
 */

import type { SimilarityMatrix } from '../types/index.js';
import { normalizeTitle } from '../shared/url-utils.js';
import { log, errorMessage } from '../server/logging.js';
import type { EmbeddingVector, EncoderHandle, SentenceEncoder } from './embeddings.js';
import { fitTransform, sparseDot, type TfidfOptions } from './tfidf.js';

export interface SimilarityEngine {
    readonly name: 'semantic' | 'lexical';
    similarity(titles: string[]): Promise<SimilarityMatrix>;
}

// ---------------------------------------------------------------------------
// Cosine Similarity
// ---------------------------------------------------------------------------

/**
 * Cosine similarity of two dense vectors, clamped to [0, 1].
 * A zero-magnitude vector is similar to nothing.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }

    let dot = 0;
    let magA = 0;
    let magB = 0;

    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        magA += a[i] * a[i];
        magB += b[i] * b[i];
    }

    const magnitude = Math.sqrt(magA) * Math.sqrt(magB);
    if (magnitude === 0) return 0;

    return clamp01(dot / magnitude);
}

function clamp01(value: number): number {
    return Math.min(1, Math.max(0, value));
}

/** Build a symmetric matrix with a unit diagonal from a pairwise function. */
export function pairwiseMatrix(n: number, pair: (i: number, j: number) => number): SimilarityMatrix {
    const matrix: SimilarityMatrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    for (let i = 0; i < n; i++) {
        matrix[i][i] = 1;
        for (let j = i + 1; j < n; j++) {
            const value = pair(i, j);
            matrix[i][j] = value;
            matrix[j][i] = value;
        }
    }
    return matrix;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

export const LEXICAL_TFIDF_OPTIONS: TfidfOptions = {
    ngramRange: [1, 3],
    minDf: 1,
    maxDf: 0.8
};

/** TF-IDF over word 1-3-grams of the normalized titles. */
export class LexicalSimilarity implements SimilarityEngine {
    readonly name = 'lexical' as const;

    constructor(private readonly options: TfidfOptions = LEXICAL_TFIDF_OPTIONS) {}

    async similarity(titles: string[]): Promise<SimilarityMatrix> {
        if (titles.length === 0) return [];
        const { vectors } = fitTransform(titles.map(normalizeTitle), this.options);
        return pairwiseMatrix(titles.length, (i, j) => clamp01(sparseDot(vectors[i], vectors[j])));
    }
}

/**
 * Dense sentence embeddings compared by cosine similarity. When encoding fails for a
 * request, that request is scored by the fallback engine instead.
 */
export class SemanticSimilarity implements SimilarityEngine {
    readonly name = 'semantic' as const;

    constructor(
        private readonly encoder: SentenceEncoder,
        private readonly fallback: SimilarityEngine = new LexicalSimilarity()
    ) {}

    async similarity(titles: string[]): Promise<SimilarityMatrix> {
        if (titles.length === 0) return [];

        let embeddings: EmbeddingVector[];
        try {
            embeddings = await this.encoder.encode(titles);
        } catch (err) {
            log('warn', 'Sentence encoding failed, using lexical similarity for this request', {
                model: this.encoder.model,
                titles: titles.length,
                error: errorMessage(err)
            });
            return this.fallback.similarity(titles);
        }

        return pairwiseMatrix(titles.length, (i, j) => cosineSimilarity(embeddings[i], embeddings[j]));
    }
}

/**
 * Pick the engine for this process. With an encoder handle the encoder is loaded now;
 * if that fails, or there is no handle, the lexical engine is used.
 */
export async function selectSimilarityEngine(encoder: EncoderHandle | null): Promise<SimilarityEngine> {
    if (!encoder) {
        log('info', 'No sentence encoder configured, using lexical similarity');
        return new LexicalSimilarity();
    }
    try {
        const loaded = await encoder.get();
        log('info', 'Using semantic similarity', { model: loaded.model });
        return new SemanticSimilarity(loaded);
    } catch (err) {
        log('warn', 'Sentence encoder unavailable, falling back to lexical similarity', { error: errorMessage(err) });
        return new LexicalSimilarity();
    }
}
