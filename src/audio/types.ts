/**
 * Audio Capture Types
 */

import { ALLOWED_RECORDERS } from '../constants';

export type RecorderProgram = typeof ALLOWED_RECORDERS[number];

export interface CaptureConfig {
    recorder: RecorderProgram;
    sampleRate: number;
    channels: number;
    /** Capture device; recorder default when unset */
    device?: string;
}

export interface RecorderCommand {
    command: string;
    args: string[];
    env?: Record<string, string>;
}

export type ChunkHandler = (chunk: Buffer) => void;

/** Called when the recorder ends on its own (not through stop()) */
export type ExitHandler = (error: Error) => void;
