import type { FeedQuery, NewsRequest } from '../types/index.js';

// Headers sent with every feed request
export const FEED_HEADERS = {
  "User-Agent": "Mozilla/5.0 (compatible; TopicNewsDigest/1.0; +https://news.google.com/rss)",
  "Accept": "application/rss+xml, application/xml, text/xml, */*",
  "Cache-Control": "no-cache"
};

export const GOOGLE_NEWS_SEARCH_URL = "https://news.google.com/rss/search";
export const DEFAULT_FEED_TIMEOUT_MS = 10000;

// Fallback combinations queried alongside the user's own choice
export const DEFAULT_REGION = "US";
export const DEFAULT_LANGUAGE = "en";

export const LOCATIONS: Record<string, string> = {
  US: "United States",
  GB: "United Kingdom",
  DE: "Germany",
  FR: "France",
  IT: "Italy",
  ES: "Spain",
  CA: "Canada",
  AU: "Australia",
  IN: "India",
  JP: "Japan"
};

export const LANGUAGES: Record<string, string> = {
  en: "English",
  de: "German",
  fr: "French",
  it: "Italian",
  es: "Spanish",
  ja: "Japanese",
  hi: "Hindi"
};

export function isSupportedLocation(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(LOCATIONS, code);
}

export function isSupportedLanguage(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(LANGUAGES, code);
}

/**
 * The three (location, language) combinations searched for one request, in merge order:
 * the user's choice, the default region in the user's language, and the user's region in the default language.
 */
export function buildFeedQueries(request: NewsRequest): FeedQuery[] {
  const { topic, location, language } = request;
  return [
    { query: topic, location, language },
    { query: topic, location: DEFAULT_REGION, language },
    { query: topic, location, language: DEFAULT_LANGUAGE }
  ];
}

// Spaces become '+', everything else is percent-encoded
export function encodeTopic(topic: string): string {
  return topic.trim().split(/\s+/).map(encodeURIComponent).join('+');
}

export function buildSearchUrl(query: FeedQuery, baseUrl: string = GOOGLE_NEWS_SEARCH_URL): string {
  const q = encodeTopic(query.query);
  const hl = encodeURIComponent(query.language);
  const gl = encodeURIComponent(query.location);
  return `${baseUrl}?q=${q}&hl=${hl}&gl=${gl}&ceid=${gl}:${hl}`;
}
