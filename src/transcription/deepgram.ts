/**
 * Deepgram Live Client
 *
 * Streams linear16 PCM over a WebSocket and reports final transcripts.
 * Close code 1000 is the normal end of a stream and is not an error.
 */

import WebSocket from 'ws';
import * as Logging from '../logging';
import { TranscriptionError, describeError } from '../error';
import { CLOSE_TIMEOUT_MS, CONNECT_TIMEOUT_MS, DEEPGRAM_LISTEN_URL, NORMAL_CLOSURE_CODE } from '../constants';
import { CLOSE_STREAM_MESSAGE, buildListenUrl, parseMessage } from './messages';
import type { LiveConnection, LiveHandlers, LiveTranscriptionConfig } from './types';

export interface ClientInstance {
    connect(handlers: LiveHandlers): Promise<LiveConnection>;
}

const toText = (data: WebSocket.RawData): string => {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data).toString('utf8');
    }
    return data.toString('utf8');
};

export const create = (config: LiveTranscriptionConfig): ClientInstance => {
    const logger = Logging.getLogger();
    const connectTimeout = config.connectTimeout ?? CONNECT_TIMEOUT_MS;
    const closeTimeout = config.closeTimeout ?? CLOSE_TIMEOUT_MS;

    const connect = (handlers: LiveHandlers): Promise<LiveConnection> => new Promise((resolve, reject) => {
        const url = buildListenUrl(config.url ?? DEEPGRAM_LISTEN_URL, config);
        logger.debug('Connecting to live transcription: %s', url);

        const socket = new WebSocket(url, {
            headers: { Authorization: `Token ${config.apiKey}` },
        });

        let opened = false;
        let finishing = false;
        let isClosed = false;
        let markClosed: () => void = () => undefined;
        const closed = new Promise<void>((done) => {
            markClosed = done;
        });

        const timer = setTimeout(() => {
            if (!opened) {
                reject(new TranscriptionError(`Timed out connecting to live transcription after ${connectTimeout}ms`));
                socket.terminate();
            }
        }, connectTimeout);

        const handleMessage = (text: string) => {
            const parsed = parseMessage(text);
            switch (parsed.kind) {
                case 'invalid':
                    logger.warn('Skipping malformed transcription message: %s', parsed.reason);
                    return;
                case 'ignored':
                    logger.debug('Ignoring %s message', parsed.type);
                    return;
                case 'transcript': {
                    const { transcript, isFinal } = parsed.event;
                    if (!transcript.trim()) {
                        return;
                    }
                    if (!isFinal) {
                        logger.debug('Interim transcript: %s', transcript);
                        return;
                    }
                    logger.verbose('Transcript: %s', transcript);
                    try {
                        handlers.onTranscript(transcript);
                    } catch (error) {
                        logger.error('Error handling transcript: %s', describeError(error));
                    }
                }
            }
        };

        const connection: LiveConnection = {
            send: (chunk: Buffer) => {
                if (socket.readyState === WebSocket.OPEN) {
                    socket.send(chunk);
                }
            },
            finish: async () => {
                if (isClosed) {
                    return;
                }
                finishing = true;
                if (socket.readyState === WebSocket.OPEN) {
                    socket.send(CLOSE_STREAM_MESSAGE);
                }

                let timeout: NodeJS.Timeout | undefined;
                const timedOut = new Promise<boolean>((done) => {
                    timeout = setTimeout(() => done(true), closeTimeout);
                });
                const expired = await Promise.race([closed.then(() => false), timedOut]);
                clearTimeout(timeout);

                if (expired) {
                    logger.debug('Live transcription did not close within %dms, terminating', closeTimeout);
                    socket.terminate();
                    await closed;
                }
            },
            isOpen: () => socket.readyState === WebSocket.OPEN,
        };

        socket.on('open', () => {
            opened = true;
            clearTimeout(timer);
            logger.debug('Connected to live transcription');
            resolve(connection);
        });

        socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            if (isBinary) {
                return;
            }
            handleMessage(toText(data));
        });

        socket.on('error', (error: Error) => {
            if (!opened) {
                clearTimeout(timer);
                reject(new TranscriptionError(`Could not connect to live transcription: ${error.message}`));
                return;
            }
            logger.error('Live transcription socket error: %s', error.message);
        });

        socket.on('close', (code: number, reason: Buffer) => {
            clearTimeout(timer);
            isClosed = true;
            markClosed();

            const text = reason.toString();
            if (code === NORMAL_CLOSURE_CODE || finishing) {
                logger.debug('Live transcription closed (%d)', code);
            } else {
                logger.error('Live transcription closed unexpectedly: %d %s', code, text);
            }

            if (!opened) {
                reject(new TranscriptionError(`Live transcription closed before opening (${code})`, code));
                return;
            }
            if (!finishing) {
                handlers.onClose?.(code, text);
            }
        });
    });

    return { connect };
};
