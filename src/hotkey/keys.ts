import { ConfigurationError } from '../error';

/**
 * Resolve a configured key name ("Alt", "f9", "ScrollLock") against a hook
 * library's key table. Matching ignores case.
 */
export const resolveHotkey = (name: string, table: Readonly<Record<string, number>>): number[] => {
    const wanted = name.trim().toLowerCase();
    const codes = Object.entries(table)
        .filter(([keyName]) => keyName.toLowerCase() === wanted)
        .map(([, code]) => code);

    if (codes.length === 0) {
        throw new ConfigurationError(`Unknown hotkey '${name}'. Use a key name such as Alt, F9 or ScrollLock.`);
    }
    return codes;
};
