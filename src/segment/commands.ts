/**
 * Voice Commands
 *
 * Spoken phrases that become key presses instead of dictated text.
 */

import type { CommandMatch, KeyName } from './types';

export const RETURN_KEY: KeyName = 'Return';

export const VOICE_COMMANDS: ReadonlyMap<string, KeyName> = new Map([
    ['enter', RETURN_KEY],
    ['enters', RETURN_KEY],
    ['enter key', RETURN_KEY],
    ['type enter', RETURN_KEY],
    ['press enter', RETURN_KEY],
    ['new line', RETURN_KEY],
    ['next line', RETURN_KEY],
]);

// "enter enter enter" presses Return three times
const REPEATABLE_WORDS: ReadonlyMap<string, KeyName> = new Map([
    ['enter', RETURN_KEY],
    ['enters', RETURN_KEY],
]);

/**
 * Match a content token against the command table.
 *
 * The token must equal a command phrase exactly (after trimming and
 * lower-casing), or consist only of repeatable command words.
 */
export const matchCommand = (content: string): CommandMatch | null => {
    const phrase = content.trim().toLowerCase();
    if (!phrase) {
        return null;
    }

    const key = VOICE_COMMANDS.get(phrase);
    if (key !== undefined) {
        return { key, count: 1 };
    }

    const words = phrase.split(/\s+/);
    const keys = words.map(word => REPEATABLE_WORDS.get(word));
    const first = keys[0];
    if (first !== undefined && keys.every(k => k === first)) {
        return { key: first, count: words.length };
    }

    return null;
};
