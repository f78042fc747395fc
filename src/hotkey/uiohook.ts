/**
 * uiohook-napi binding
 *
 * Loaded lazily: the native module needs a display server, which tests and
 * headless environments do not have.
 */

import { resolveHotkey } from './keys';
import type { KeyboardHook } from './types';

export interface LoadedHook {
    hook: KeyboardHook;
    resolve(name: string): number[];
}

export const load = async (): Promise<LoadedHook> => {
    const { uIOhook, UiohookKey } = await import('uiohook-napi');

    const hook: KeyboardHook = {
        onKeyDown: (listener) => {
            uIOhook.on('keydown', listener);
        },
        onKeyUp: (listener) => {
            uIOhook.on('keyup', listener);
        },
        start: () => uIOhook.start(),
        stop: () => uIOhook.stop(),
    };

    return {
        hook,
        resolve: (name: string) => resolveHotkey(name, UiohookKey),
    };
};
