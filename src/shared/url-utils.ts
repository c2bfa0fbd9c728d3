/**
 * URL and title normalization utilities shared by the fetcher and the lexical similarity engine.
 */

const TRACKING_PARAMS = ['fbclid', 'gclid', 'mc_cid', 'mc_eid'];

/**
 * Canonical form of an article link used as the dedupe key.
 * Drops tracking parameters and the fragment. Case is kept: feed article ids are case-sensitive.
 */
export function canonicalLink(url: string): string {
    const trimmed = (url || '').trim();
    if (!trimmed) return '';
    try {
        const u = new URL(trimmed);
        const toDelete: string[] = [];
        u.searchParams.forEach((_, key) => {
            const lower = key.toLowerCase();
            if (lower.startsWith('utm_') || TRACKING_PARAMS.includes(lower)) {
                toDelete.push(key);
            }
        });
        toDelete.forEach(k => u.searchParams.delete(k));
        u.hash = '';
        return u.toString();
    } catch {
        return trimmed;
    }
}

// Collapse whitespace, trim, lowercase
export function normalizeTitle(title: string): string {
    if (!title) return '';
    return title.replace(/\s+/g, ' ').trim().toLowerCase();
}
