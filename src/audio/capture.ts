/**
 * Microphone Capture
 *
 * Runs a recorder subprocess and hands its stdout to the caller in chunks.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import * as Logging from '../logging';
import { CaptureError } from '../error';
import { buildRecorderCommand } from './recorder';
import type { CaptureConfig, ChunkHandler, ExitHandler } from './types';

export interface CaptureInstance {
    start(onChunk: ChunkHandler, onExit?: ExitHandler): void;
    stop(): Promise<void>;
    isRunning(): boolean;
}

export const create = (config: CaptureConfig): CaptureInstance => {
    const logger = Logging.getLogger();

    let child: ChildProcess | null = null;
    let exited: Promise<void> = Promise.resolve();
    let stopping = false;

    const start = (onChunk: ChunkHandler, onExit?: ExitHandler): void => {
        if (child) {
            logger.debug('Recorder already running');
            return;
        }

        const { command, args, env } = buildRecorderCommand(config);
        logger.debug('Starting recorder: %s %s', command, args.join(' '));

        stopping = false;
        const recorder = spawn(command, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            ...(env ? { env: { ...process.env, ...env } } : {}),
        });
        child = recorder;

        let bytes = 0;
        recorder.stdout?.on('data', (chunk: Buffer) => {
            bytes += chunk.length;
            onChunk(chunk);
        });

        recorder.stderr?.on('data', (data: Buffer) => {
            const message = data.toString().trim();
            if (message) {
                logger.debug('%s: %s', command, message);
            }
        });

        exited = new Promise<void>((resolve) => {
            let done = false;
            const finish = (error: Error | null) => {
                if (done) {
                    return;
                }
                done = true;
                child = null;
                logger.debug('Recorder finished after %d bytes', bytes);
                if (error && !stopping) {
                    logger.error('Audio capture ended: %s', error.message);
                    onExit?.(error);
                }
                resolve();
            };

            recorder.on('error', (error: Error) => {
                finish(new CaptureError(`Could not run ${command}: ${error.message}`));
            });

            recorder.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
                finish(new CaptureError(`${command} exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`));
            });
        });
    };

    const stop = async (): Promise<void> => {
        if (!child) {
            return;
        }
        stopping = true;
        child.kill('SIGTERM');
        await exited;
    };

    return {
        start,
        stop,
        isRunning: () => child !== null,
    };
};
