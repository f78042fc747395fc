export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class TranscriptionError extends Error {
    constructor(message: string, readonly code?: number) {
        super(message);
        this.name = 'TranscriptionError';
    }
}

export class CaptureError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CaptureError';
    }
}

export const describeError = (error: unknown): string => error instanceof Error ? error.message : String(error);
