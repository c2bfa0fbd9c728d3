import * as fs from 'fs';
import * as path from 'path';
import type { AutomaticSubscriber, PreferenceStore, StoredUser, UserPreferences, UserProfile } from '../types/index.js';
import { DEFAULT_LANGUAGE, DEFAULT_REGION } from '../feeds/config.js';
import { log, errorMessage } from '../server/logging.js';
import { asRecord } from '../shared/guards.js';

// File-based persistent storage of per-user preferences
export const DEFAULT_PREFERENCES_FILE = path.join(process.cwd(), 'preferences.json');

type StoreFile = {
    users: StoredUser[];
};

function readUser(value: unknown): StoredUser | null {
    const record = asRecord(value);
    const prefs = asRecord(record?.preferences);
    if (!record || !prefs || typeof record.id !== 'number' || typeof prefs.topic !== 'string') return null;
    const profile = asRecord(record.profile) ?? {};
    const text = (v: unknown, fallback: string) => (typeof v === 'string' ? v : fallback);
    const now = new Date().toISOString();
    return {
        id: record.id,
        profile: {
            firstName: text(profile.firstName, ''),
            lastName: text(profile.lastName, ''),
            fullName: text(profile.fullName, ''),
            username: text(profile.username, ''),
            link: text(profile.link, `tg://user?id=${record.id}`)
        },
        preferences: {
            topic: prefs.topic,
            language: text(prefs.language, DEFAULT_LANGUAGE),
            location: text(prefs.location, DEFAULT_REGION),
            automatic: prefs.automatic === true
        },
        createdAt: text(record.createdAt, now),
        updatedAt: text(record.updatedAt, now)
    };
}

export class JsonPreferenceStore implements PreferenceStore {
    private users: Map<number, StoredUser> | null = null;

    constructor(private readonly filePath: string = DEFAULT_PREFERENCES_FILE) {}

    private load(): Map<number, StoredUser> {
        if (this.users) return this.users;

        const users = new Map<number, StoredUser>();
        if (fs.existsSync(this.filePath)) {
            const data = asRecord(JSON.parse(fs.readFileSync(this.filePath, 'utf8')));
            const stored = data?.users;
            const list: unknown[] = Array.isArray(stored) ? stored : [];
            for (const item of list) {
                const user = readUser(item);
                if (user) users.set(user.id, user);
            }
            log('info', 'Loaded user preferences', { file: this.filePath, users: users.size });
        }

        this.users = users;
        return users;
    }

    private persist(): void {
        const data: StoreFile = { users: Array.from(this.load().values()) };
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2), 'utf8');
        } catch (err) {
            log('error', 'Failed to save user preferences', { file: this.filePath, error: errorMessage(err) });
            throw err;
        }
    }

    async get(userId: number): Promise<UserPreferences | null> {
        const user = this.load().get(userId);
        return user ? { ...user.preferences } : null;
    }

    async save(
        userId: number,
        profile: Partial<UserProfile>,
        preferences: Partial<UserPreferences> & { topic: string }
    ): Promise<number> {
        const users = this.load();
        const now = new Date().toISOString();
        const existing = users.get(userId);

        users.set(userId, {
            id: userId,
            profile: {
                firstName: profile.firstName ?? '',
                lastName: profile.lastName ?? '',
                fullName: profile.fullName ?? '',
                username: profile.username ?? '',
                link: profile.link ?? `tg://user?id=${userId}`
            },
            preferences: {
                topic: preferences.topic,
                language: preferences.language || DEFAULT_LANGUAGE,
                location: preferences.location || DEFAULT_REGION,
                automatic: preferences.automatic ?? false
            },
            createdAt: existing?.createdAt ?? now,
            updatedAt: now
        });

        this.persist();
        log('info', 'Saved preferences', { userId });
        return userId;
    }

    // Most recently updated first
    async listAutomatic(): Promise<AutomaticSubscriber[]> {
        return Array.from(this.load().values())
            .filter(user => user.preferences.automatic)
            .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
            .map(user => ({
                id: user.id,
                topic: user.preferences.topic,
                language: user.preferences.language,
                location: user.preferences.location
            }));
    }

    async setAutomatic(userId: number, automatic: boolean): Promise<boolean> {
        const user = this.load().get(userId);
        if (!user) {
            log('warn', 'User not found when updating automatic status', { userId });
            return false;
        }
        user.preferences = { ...user.preferences, automatic };
        user.updatedAt = new Date().toISOString();
        this.persist();
        log('info', 'Updated automatic status', { userId, automatic });
        return true;
    }
}
