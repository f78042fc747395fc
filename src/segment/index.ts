/**
 * Segmentation
 *
 * Turns raw transcripts into text and key-press actions.
 */

export { segment } from './segmenter';
export { matchCommand, VOICE_COMMANDS, RETURN_KEY } from './commands';
export * from './types';
