/**
 * Action Dispatcher
 *
 * The single channel from the transcription receive loop to the output
 * side. Transcripts are segmented and their actions run strictly in
 * arrival order, one at a time, so typed text and key presses never
 * interleave.
 */

import * as Logging from '../logging';
import { describeError } from '../error';
import * as Segment from '../segment';
import { sleep } from '../util/timing';
import type { LogInstance } from '../output';
import type { TypistInstance } from '../typing';

export interface DispatchConfig {
    /** Pause after each key press */
    keyDelay: number;
}

export interface DispatcherInstance {
    /** Queue a transcript; resolves once its actions have run */
    handleTranscript(transcript: string): Promise<void>;
    /** Resolves once everything queued so far has run */
    idle(): Promise<void>;
}

export const create = (
    config: DispatchConfig,
    typist: TypistInstance,
    transcriptLog: LogInstance
): DispatcherInstance => {
    const logger = Logging.getLogger();
    let queue: Promise<void> = Promise.resolve();

    const perform = async (action: Segment.SegmentAction): Promise<void> => {
        switch (action.kind) {
            case 'emit-text':
                await transcriptLog.record(action.text);
                // Trailing space separates consecutive utterances
                await typist.typeText(`${action.text} `);
                return;
            case 'execute-key':
                logger.verbose('Executing command: %s', action.key);
                await typist.pressKey(action.key);
                await sleep(config.keyDelay);
                return;
        }
    };

    const handleTranscript = (transcript: string): Promise<void> => {
        const actions = Segment.segment(transcript);
        logger.debug('Transcript "%s" -> %d action(s)', transcript, actions.length);

        for (const action of actions) {
            queue = queue.then(() => perform(action)).catch((error: unknown) => {
                logger.error('Error handling %s action: %s', action.kind, describeError(error));
            });
        }
        return queue;
    };

    return {
        handleTranscript,
        idle: () => queue,
    };
};
