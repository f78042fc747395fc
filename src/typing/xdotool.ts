/**
 * xdotool Typist
 *
 * Injects text and key presses into whichever window has keyboard focus.
 * While xdotool runs (and for a settle delay afterwards) the session's
 * typing flag is set so the hotkey listener ignores the echoed events.
 * When xdotool is missing the typist stays in log-only mode.
 */

import * as Logging from '../logging';
import { describeError } from '../error';
import { TYPING_TOOL } from '../constants';
import * as Child from '../util/child';
import { sleep } from '../util/timing';
import type { SessionState } from '../session';
import type { TypingConfig } from './types';

export interface TypistInstance {
    isAvailable(): boolean;
    /** Resolves false when the text was not typed */
    typeText(text: string): Promise<boolean>;
    pressKey(key: string): Promise<boolean>;
}

export const create = async (
    config: TypingConfig,
    state: SessionState,
    runner: Child.Runner = Child.run
): Promise<TypistInstance> => {
    const logger = Logging.getLogger();

    let available = false;
    if (!config.enabled) {
        logger.info('Typing disabled, transcriptions will only be logged');
    } else {
        available = await Child.commandExists(TYPING_TOOL, runner);
        if (available) {
            logger.debug('%s found, typing into the focused window', TYPING_TOOL);
        } else {
            logger.warn('%s not found, typing will not work. Install with: sudo apt install %s', TYPING_TOOL, TYPING_TOOL);
        }
    }

    const invoke = async (args: string[]): Promise<void> => {
        state.typing = true;
        try {
            await runner(TYPING_TOOL, args);
        } finally {
            await sleep(config.settleDelay);
            state.typing = false;
        }
    };

    const typeText = async (text: string): Promise<boolean> => {
        if (!available) {
            logger.debug('Not typed (log-only mode): %s', text);
            return false;
        }
        try {
            // `--` so text starting with a dash is not read as an option
            await invoke(['type', '--clearmodifiers', '--delay', String(config.typeDelay), '--', text]);
            logger.debug('Typed: %s', text);
            return true;
        } catch (error) {
            logger.warn('Failed to type text, is a text field focused? %s', describeError(error));
            return false;
        }
    };

    const pressKey = async (key: string): Promise<boolean> => {
        if (!available) {
            logger.debug('Key not pressed (log-only mode): %s', key);
            return false;
        }
        try {
            await invoke(['key', key]);
            logger.debug('Pressed key: %s', key);
            return true;
        } catch (error) {
            logger.warn('Failed to press %s: %s', key, describeError(error));
            return false;
        }
    };

    return {
        isAvailable: () => available,
        typeText,
        pressKey,
    };
};
