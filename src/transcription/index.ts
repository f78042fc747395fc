/**
 * Live transcription over the Deepgram streaming API.
 */

export { create } from './deepgram';
export type { ClientInstance } from './deepgram';
export { parseMessage, buildListenUrl, CLOSE_STREAM_MESSAGE } from './messages';
export type { ParsedMessage, ListenParams } from './messages';
export * from './types';
