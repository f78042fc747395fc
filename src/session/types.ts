/**
 * Session Types
 */

export type SessionStatus = 'idle' | 'listening';

/**
 * Mutable state shared by the hotkey listener, the typist and the
 * lifecycle controller. One instance per running program.
 */
export interface SessionState {
    /** Dictation is active */
    listening: boolean;
    /** Synthetic key events are being injected; hotkey events are echoes */
    typing: boolean;
    /** Cleared once shutdown begins */
    running: boolean;
}

export interface SessionHooks {
    /** Connect to the transcription service and start capturing audio */
    start(): Promise<void>;
    /** Stop capturing audio and close the connection */
    stop(): Promise<void>;
}

export interface ControllerOptions {
    onStatusChange?: (status: SessionStatus) => void;
}
