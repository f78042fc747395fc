/**
 * Synthetic Typing Types
 */

export interface TypingConfig {
    /** Typing turned on by configuration; still needs xdotool on the PATH */
    enabled: boolean;
    /** Delay between typed characters, passed to xdotool */
    typeDelay: number;
    /** How long hotkey events stay suppressed after each injection */
    settleDelay: number;
}
