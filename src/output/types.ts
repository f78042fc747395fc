/**
 * Transcription Log Types
 */

export interface LogConfig {
    /** Every recorded line is appended here */
    logFile: string;
    /** Where save() writes transcript snapshots */
    saveDirectory: string;
}

export type LineWriter = (line: string) => void;
