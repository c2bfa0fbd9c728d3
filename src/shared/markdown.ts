/**
 * Telegram MarkdownV2 helpers.
 *
 * Escaping is applied once, at render time, to raw feed or literal text. Already-rendered
 * markup must never be passed through {@link escapeMarkdownV2} again.
 */

// Telegram's reserved set plus the backslash
const RESERVED = /[_*[\]()~`>#+\-=|{}.!\\]/g;

export function escapeMarkdownV2(text: string): string {
    return text.replace(RESERVED, '\\$&');
}

// Inside (...) of an inline link only ')' and '\' are significant
export function escapeLinkUrl(url: string): string {
    return url.trim().replace(/[)\\]/g, '\\$&');
}

// Truncate by code points so a surrogate pair is never split
export function truncate(text: string, max: number): string {
    const chars = Array.from(text);
    return chars.length > max ? chars.slice(0, max).join('') : text;
}
