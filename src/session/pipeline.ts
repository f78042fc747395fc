/**
 * Session Pipeline
 *
 * Connects microphone capture to live transcription behind a session
 * controller. Starting opens the connection and then the recorder;
 * stopping ends the recorder first so the last audio still reaches the
 * service before the stream is closed.
 *
 * A connection that closes without being asked to, or a recorder that
 * exits on its own, stops the session if it is still listening.
 */

import * as Logging from '../logging';
import { describeError } from '../error';
import { create } from './controller';
import type { ControllerInstance } from './controller';
import type { CaptureInstance } from '../audio';
import type { ClientInstance, LiveConnection } from '../transcription';
import type { ControllerOptions, SessionState } from './types';

export interface PipelineParts {
    client: ClientInstance;
    capture: CaptureInstance;
    /** Receives every final transcript */
    onTranscript(transcript: string): void;
}

export const createPipeline = (
    state: SessionState,
    parts: PipelineParts,
    options: ControllerOptions = {}
): ControllerInstance => {
    const logger = Logging.getLogger();
    const { client, capture } = parts;

    let connection: LiveConnection | null = null;

    const stopAfterFailure = (reason: string) => {
        if (!state.listening) {
            return;
        }
        logger.warn('%s, stopping', reason);
        controller.stop().catch((error: unknown) => {
            logger.error('Error stopping after failure: %s', describeError(error));
        });
    };

    const controller = create(state, {
        start: async () => {
            const live = await client.connect({
                onTranscript: parts.onTranscript,
                onClose: (code) => stopAfterFailure(`Transcription connection closed (${code})`),
            });
            connection = live;
            capture.start(
                (chunk) => live.send(chunk),
                (error) => stopAfterFailure(error.message),
            );
        },
        stop: async () => {
            await capture.stop();
            const live = connection;
            connection = null;
            await live?.finish();
        },
    }, options);

    return controller;
};
