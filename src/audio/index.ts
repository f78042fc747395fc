/**
 * Audio capture from the default (or configured) microphone.
 */

export { create } from './capture';
export type { CaptureInstance } from './capture';
export { buildRecorderCommand } from './recorder';
export * from './types';
