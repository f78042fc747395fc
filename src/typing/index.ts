/**
 * Synthetic typing into the focused window.
 */

export { create } from './xdotool';
export type { TypistInstance } from './xdotool';
export * from './types';
