/**
 * Global hotkey handling.
 */

export { create } from './listener';
export type { ListenerInstance } from './listener';
export { resolveHotkey } from './keys';
export { load } from './uiohook';
export type { LoadedHook } from './uiohook';
export * from './types';
