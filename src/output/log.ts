/**
 * Transcription Log
 *
 * Keeps the session transcript in memory, appends each line to the log
 * file, and saves snapshots on request. File failures are logged and never
 * interrupt dictation.
 */

import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import dayjs from 'dayjs';
import * as Logging from '../logging';
import { describeError } from '../error';
import {
    DEFAULT_CHARACTER_ENCODING,
    LOG_TIMESTAMP_FORMAT,
    SAVE_FILENAME_TIMESTAMP_FORMAT,
} from '../constants';
import type { LineWriter, LogConfig } from './types';

export interface LogInstance {
    /** Record one emitted line; returns the formatted line */
    record(text: string, date?: Date): Promise<string>;
    /** Write the in-memory transcript to a timestamped file; returns its path */
    save(date?: Date): Promise<string>;
    clear(): void;
    entries(): readonly string[];
}

export const formatLine = (text: string, date: Date): string =>
    `[${dayjs(date).format(LOG_TIMESTAMP_FORMAT)}] ${text}`;

export const saveFilename = (date: Date): string =>
    `transcription_${dayjs(date).format(SAVE_FILENAME_TIMESTAMP_FORMAT)}.txt`;

export const create = (config: LogConfig, display?: LineWriter): LogInstance => {
    const logger = Logging.getLogger();
    let lines: string[] = [];

    const record = async (text: string, date: Date = new Date()): Promise<string> => {
        const line = formatLine(text, date);
        lines.push(line);
        display?.(line);

        try {
            await fs.appendFile(config.logFile, `${line}\n`, DEFAULT_CHARACTER_ENCODING);
        } catch (error) {
            logger.error('Error appending to %s: %s', config.logFile, describeError(error));
        }
        return line;
    };

    const save = async (date: Date = new Date()): Promise<string> => {
        const filename = path.join(config.saveDirectory, saveFilename(date));
        const content = lines.map(line => `${line}\n`).join('');

        await fs.mkdir(config.saveDirectory, { recursive: true });
        await fs.writeFile(filename, content, DEFAULT_CHARACTER_ENCODING);
        logger.info('Transcription saved to %s', filename);

        const note = `[Transcription saved to ${filename}]`;
        lines.push(note);
        display?.(note);
        return filename;
    };

    return {
        record,
        save,
        clear: () => {
            lines = [];
        },
        entries: () => [...lines],
    };
};
