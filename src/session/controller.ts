/**
 * Session Controller
 *
 * Starts and stops listening. Lifecycle operations are chained so they run
 * one after another; toggle() reads the state when its turn comes, not when
 * it is called.
 */

import * as Logging from '../logging';
import { describeError } from '../error';
import { statusOf } from './state';
import type { ControllerOptions, SessionHooks, SessionState, SessionStatus } from './types';

export interface ControllerInstance {
    start(): Promise<void>;
    stop(): Promise<void>;
    toggle(): Promise<void>;
    getStatus(): SessionStatus;
    /** Resolves once every queued lifecycle operation has finished */
    settled(): Promise<void>;
}

export const create = (
    state: SessionState,
    hooks: SessionHooks,
    options: ControllerOptions = {}
): ControllerInstance => {
    const logger = Logging.getLogger();

    let chain: Promise<void> = Promise.resolve();

    const report = () => {
        options.onStatusChange?.(statusOf(state));
    };

    const doStop = async (): Promise<void> => {
        if (!state.listening) {
            logger.verbose('Not listening, ignoring stop');
            return;
        }

        state.listening = false;
        report();

        try {
            await hooks.stop();
            logger.info('Stopped listening');
        } catch (error) {
            logger.error('Error stopping transcription: %s', describeError(error));
        }
    };

    const doStart = async (): Promise<void> => {
        if (state.listening) {
            logger.verbose('Already listening, ignoring start');
            return;
        }
        if (!state.running) {
            logger.debug('Shutting down, ignoring start');
            return;
        }

        state.listening = true;
        report();

        try {
            await hooks.start();
            logger.info('Started listening');
        } catch (error) {
            logger.error('Error starting transcription: %s', describeError(error));
            await doStop();
        }
    };

    const enqueue = (operation: () => Promise<void>): Promise<void> => {
        const next = chain.then(operation);
        // Operations log their own failures; keep the chain alive regardless
        chain = next.catch((error: unknown) => {
            logger.error('Unexpected session error: %s', describeError(error));
        });
        return chain;
    };

    return {
        start: () => enqueue(doStart),
        stop: () => enqueue(doStop),
        toggle: () => enqueue(() => state.listening ? doStop() : doStart()),
        getStatus: () => statusOf(state),
        settled: () => chain,
    };
};
