/**
 * Hotkey Listener
 *
 * Press-to-toggle: each press of the hotkey toggles listening. Auto-repeat
 * while the key is held is ignored, and so are presses that arrive while
 * synthetic typing is in progress (xdotool re-presses held modifiers).
 */

import * as Logging from '../logging';
import { describeError } from '../error';
import type { SessionState } from '../session';
import type { HotkeyConfig, KeyboardHook, KeyEvent, Toggleable } from './types';

export interface ListenerInstance {
    start(): void;
    stop(): void;
    isHeld(): boolean;
}

export const create = (
    hook: KeyboardHook,
    config: HotkeyConfig,
    state: SessionState,
    target: Toggleable
): ListenerInstance => {
    const logger = Logging.getLogger();

    let held = false;
    let started = false;
    let pending: NodeJS.Timeout | null = null;

    const isHotkey = (event: KeyEvent) => config.keycodes.includes(event.keycode);

    const fireToggle = () => {
        pending = null;
        target.toggle().catch((error: unknown) => {
            logger.error('Hotkey toggle failed: %s', describeError(error));
        });
    };

    const onKeyDown = (event: KeyEvent) => {
        if (!started || !isHotkey(event)) {
            return;
        }
        if (state.typing) {
            logger.debug('Ignoring hotkey press during synthetic typing');
            return;
        }
        if (held) {
            return;
        }
        held = true;

        logger.debug('Hotkey pressed (listening: %s)', state.listening);
        if (config.activationDelay > 0) {
            pending = setTimeout(fireToggle, config.activationDelay);
        } else {
            fireToggle();
        }
    };

    const onKeyUp = (event: KeyEvent) => {
        if (isHotkey(event)) {
            held = false;
        }
    };

    let registered = false;

    return {
        start: () => {
            if (started) {
                return;
            }
            if (!registered) {
                hook.onKeyDown(onKeyDown);
                hook.onKeyUp(onKeyUp);
                registered = true;
            }
            started = true;
            hook.start();
        },
        stop: () => {
            if (!started) {
                return;
            }
            started = false;
            if (pending) {
                clearTimeout(pending);
                pending = null;
            }
            hook.stop();
        },
        isHeld: () => held,
    };
};
