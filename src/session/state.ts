import type { SessionState, SessionStatus } from './types';

export const createState = (): SessionState => ({
    listening: false,
    typing: false,
    running: true,
});

export const statusOf = (state: SessionState): SessionStatus => state.listening ? 'listening' : 'idle';
