/**
 * TF-IDF vectorizer over word n-grams.
 *
 * Weights are raw term counts times the smoothed inverse document frequency
 * `ln((1 + n) / (1 + df)) + 1`, and each document vector is L2-normalized, so the
 * dot product of two vectors is their cosine similarity.
 */

export type SparseVector = Map<string, number>;

export interface TfidfOptions {
    /** Smallest and largest n-gram length, inclusive. */
    ngramRange?: [number, number];
    /** Terms must appear in at least this many documents. */
    minDf?: number;
    /** Terms appearing in more than this fraction of documents are dropped. */
    maxDf?: number;
}

// Runs of Unicode letters, combining marks, digits and underscores
const TOKEN_PATTERN = /[\p{L}\p{M}\p{N}_]+/gu;

export function tokenize(text: string): string[] {
    return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export function wordNgrams(tokens: string[], minN: number, maxN: number): string[] {
    const grams: string[] = [];
    for (let n = minN; n <= maxN; n++) {
        for (let i = 0; i + n <= tokens.length; i++) {
            grams.push(tokens.slice(i, i + n).join(' '));
        }
    }
    return grams;
}

export interface TfidfModel {
    vocabulary: Map<string, number>;
    vectors: SparseVector[];
}

export function fitTransform(documents: string[], options: TfidfOptions = {}): TfidfModel {
    const [minN, maxN] = options.ngramRange ?? [1, 3];
    const minDf = options.minDf ?? 1;
    const maxDf = options.maxDf ?? 1.0;
    const n = documents.length;

    const counts: Map<string, number>[] = documents.map(doc => {
        const termCounts = new Map<string, number>();
        for (const gram of wordNgrams(tokenize(doc), minN, maxN)) {
            termCounts.set(gram, (termCounts.get(gram) ?? 0) + 1);
        }
        return termCounts;
    });

    const docFreq = new Map<string, number>();
    for (const termCounts of counts) {
        for (const term of termCounts.keys()) {
            docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
        }
    }

    const maxDocCount = maxDf * n;
    const idf = new Map<string, number>();
    for (const [term, df] of docFreq) {
        if (df < minDf || df > maxDocCount) continue;
        idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
    }

    const vectors = counts.map(termCounts => {
        const vec: SparseVector = new Map();
        let norm = 0;
        for (const [term, count] of termCounts) {
            const weight = idf.get(term);
            if (weight === undefined) continue;
            const value = count * weight;
            vec.set(term, value);
            norm += value * value;
        }
        if (norm > 0) {
            const scale = 1 / Math.sqrt(norm);
            for (const [term, value] of vec) vec.set(term, value * scale);
        }
        return vec;
    });

    return { vocabulary: idf, vectors };
}

// Both vectors are unit length (or empty), so this is their cosine similarity
export function sparseDot(a: SparseVector, b: SparseVector): number {
    const [small, large] = a.size <= b.size ? [a, b] : [b, a];
    let dot = 0;
    for (const [term, value] of small) {
        const other = large.get(term);
        if (other !== undefined) dot += value * other;
    }
    return dot;
}
