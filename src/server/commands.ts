import type { NewsRequest, PreferenceStore } from '../types/index.js';
import { LANGUAGES, LOCATIONS } from '../feeds/config.js';

// Outcome of a CLI command: text for the terminal, ok=false sets a failing exit code
export type CommandResult = {
    ok: boolean;
    message: string;
};

export async function subscribeUser(
    store: PreferenceStore,
    userId: number,
    request: NewsRequest,
    automatic: boolean
): Promise<CommandResult> {
    await store.save(userId, {}, { ...request, automatic });
    return {
        ok: true,
        message: `✓ Saved preferences for ${userId}: ${request.topic} (${request.location}/${request.language})${automatic ? ', daily updates on' : ''}`
    };
}

export async function describeSettings(store: PreferenceStore, userId: number): Promise<CommandResult> {
    const prefs = await store.get(userId);
    if (!prefs) {
        return { ok: false, message: `No saved preferences for ${userId}. Run "newsbot subscribe" first.` };
    }

    const location = LOCATIONS[prefs.location] ?? prefs.location;
    const language = LANGUAGES[prefs.language] ?? prefs.language;
    return {
        ok: true,
        message: [
            `Settings for ${userId}:`,
            `  Topic: ${prefs.topic}`,
            `  Location: ${location} (${prefs.location})`,
            `  Language: ${language} (${prefs.language})`,
            `  Daily updates: ${prefs.automatic ? 'on' : 'off'}`
        ].join('\n')
    };
}

export async function setDailyUpdates(store: PreferenceStore, userId: number, enabled: boolean): Promise<CommandResult> {
    const updated = await store.setAutomatic(userId, enabled);
    if (!updated) {
        return { ok: false, message: `No saved preferences for ${userId}. Run "newsbot subscribe" first.` };
    }
    return { ok: true, message: `✓ Daily updates turned ${enabled ? 'on' : 'off'} for ${userId}` };
}
