/**
 * Transcription output: the running log file and saved snapshots.
 */

export { create, formatLine, saveFilename } from './log';
export type { LogInstance } from './log';
export * from './types';
