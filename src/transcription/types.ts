/**
 * Live Transcription Types
 */

export interface LiveTranscriptionConfig {
    apiKey: string;
    model: string;
    language: string;
    sampleRate: number;
    channels: number;
    interimResults: boolean;
    /** Override for the listen endpoint */
    url?: string;
    connectTimeout?: number;
    closeTimeout?: number;
}

export interface TranscriptEvent {
    transcript: string;
    isFinal: boolean;
    confidence?: number;
}

export interface LiveHandlers {
    /** Final, non-blank transcript */
    onTranscript(transcript: string): void;
    /** Connection ended without finish() asking for it, whatever the close code */
    onClose?(code: number, reason: string): void;
}

export interface LiveConnection {
    send(chunk: Buffer): void;
    /** Ask the server to flush and close; resolves once the socket is closed */
    finish(): Promise<void>;
    isOpen(): boolean;
}
