/**
 * Hotkey Types
 */

export interface KeyEvent {
    keycode: number;
}

export type KeyListener = (event: KeyEvent) => void;

/**
 * Global keyboard hook. Backed by uiohook-napi at runtime.
 */
export interface KeyboardHook {
    onKeyDown(listener: KeyListener): void;
    onKeyUp(listener: KeyListener): void;
    start(): void;
    stop(): void;
}

export interface HotkeyConfig {
    /** Key codes that count as the hotkey (any of them) */
    keycodes: readonly number[];
    /** Wait before toggling so focus settles on the target window */
    activationDelay: number;
}

export interface Toggleable {
    toggle(): Promise<void>;
}
