// A single news item as it leaves the feed source. Read-only for the rest of the request.
export type Entry = Readonly<{
    title: string;
    link: string;
    published?: Date;
    source: string;
}>;

export type NewsRequest = {
    topic: string;
    location: string;
    language: string;
};

export type FeedQuery = {
    query: string;
    location: string;
    language: string;
};

export type FeedFetchResult = {
    status: 'ok' | 'error';
    entries: Entry[];
    error?: { type: 'network' | 'http' | 'parse'; message: string; httpStatus?: number };
    meta: { url: string; fetchedRaw: number; kept: number; durationMs: number };
};

export interface FeedSource {
    search(query: FeedQuery): Promise<FeedFetchResult>;
}

// Square, symmetric, diagonal 1, values in [0, 1].
export type SimilarityMatrix = number[][];

// Cluster id -> members in input order. Ids follow first-seen order of their members.
export type ClusterMap = Map<number, Entry[]>;

export type ChatId = number | string;

export type SendOptions = {
    markdown?: boolean;
    disablePreview?: boolean;
};

export interface MessageDelivery {
    sendMessage(chatId: ChatId, text: string, options?: SendOptions): Promise<void>;
}

export type UserPreferences = {
    topic: string;
    language: string;
    location: string;
    automatic: boolean;
};

export type UserProfile = {
    firstName: string;
    lastName: string;
    fullName: string;
    username: string;
    link: string;
};

export type StoredUser = {
    id: number;
    profile: UserProfile;
    preferences: UserPreferences;
    createdAt: string;
    updatedAt: string;
};

export type AutomaticSubscriber = {
    id: number;
    topic: string;
    language: string;
    location: string;
};

export interface PreferenceStore {
    get(userId: number): Promise<UserPreferences | null>;
    save(userId: number, profile: Partial<UserProfile>, preferences: Partial<UserPreferences> & { topic: string }): Promise<number>;
    listAutomatic(): Promise<AutomaticSubscriber[]>;
    setAutomatic(userId: number, automatic: boolean): Promise<boolean>;
}
