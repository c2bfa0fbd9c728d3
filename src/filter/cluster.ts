/**
 * Average-linkage agglomerative clustering with a distance cutoff.
 *
 * The number of clusters is not chosen up front: clusters keep merging while the
 * closest pair is nearer than the cutoff. {@link agglomerate} works on any distance
 * matrix; {@link clusterEntries} feeds it titles through a similarity engine.
 */

import type { ClusterMap, Entry } from '../types/index.js';
import type { SimilarityEngine } from './similarity.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;

/**
 * Group items by average linkage.
 *
 * Repeatedly merges the two clusters with the smallest average pairwise distance
 * while that distance is strictly below `cutoff`. Ties go to the pair found first
 * scanning clusters in index order. Returns one label per item; labels are numbered
 * in order of each cluster's first item.
 */
export function agglomerate(distances: number[][], cutoff: number): number[] {
    const n = distances.length;
    for (const row of distances) {
        if (row.length !== n) {
            throw new Error(`Distance matrix must be square, got a row of ${row.length} in a ${n}x${n} matrix`);
        }
    }

    // Linkage between live clusters, updated in place; cluster i lives at index i
    const linkage = distances.map(row => [...row]);
    const members: number[][] = Array.from({ length: n }, (_, i) => [i]);
    const alive = new Array<boolean>(n).fill(true);

    for (;;) {
        let bestI = -1;
        let bestJ = -1;
        let best = Infinity;

        for (let i = 0; i < n; i++) {
            if (!alive[i]) continue;
            for (let j = i + 1; j < n; j++) {
                if (!alive[j]) continue;
                if (linkage[i][j] < best) {
                    best = linkage[i][j];
                    bestI = i;
                    bestJ = j;
                }
            }
        }

        if (bestI < 0 || !(best < cutoff)) break;

        // Lance-Williams update for average linkage
        const sizeI = members[bestI].length;
        const sizeJ = members[bestJ].length;
        for (let k = 0; k < n; k++) {
            if (!alive[k] || k === bestI || k === bestJ) continue;
            const merged = (sizeI * linkage[bestI][k] + sizeJ * linkage[bestJ][k]) / (sizeI + sizeJ);
            linkage[bestI][k] = merged;
            linkage[k][bestI] = merged;
        }

        members[bestI] = members[bestI].concat(members[bestJ]);
        members[bestJ] = [];
        alive[bestJ] = false;
    }

    const owner = new Array<number>(n).fill(-1);
    for (let c = 0; c < n; c++) {
        if (!alive[c]) continue;
        for (const item of members[c]) owner[item] = c;
    }

    const labelOf = new Map<number, number>();
    return owner.map(c => {
        let label = labelOf.get(c);
        if (label === undefined) {
            label = labelOf.size;
            labelOf.set(c, label);
        }
        return label;
    });
}

/**
 * Cluster entries by title similarity. Two entries may end up together only while
 * their clusters' average similarity stays above `threshold`.
 */
export async function clusterEntries(
    entries: Entry[],
    engine: SimilarityEngine,
    threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): Promise<ClusterMap> {
    if (!(threshold > 0 && threshold <= 1)) {
        throw new RangeError(`Similarity threshold must be in (0, 1], got ${threshold}`);
    }

    const clusters: ClusterMap = new Map();
    if (entries.length === 0) return clusters;
    if (entries.length === 1) {
        clusters.set(0, [entries[0]]);
        return clusters;
    }

    const similarity = await engine.similarity(entries.map(e => e.title));
    const distances = similarity.map(row => row.map(s => 1 - s));
    const labels = agglomerate(distances, 1 - threshold);

    labels.forEach((label, idx) => {
        const group = clusters.get(label);
        if (group) {
            group.push(entries[idx]);
        } else {
            clusters.set(label, [entries[idx]]);
        }
    });

    return clusters;
}
