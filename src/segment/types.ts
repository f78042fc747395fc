/**
 * Segmentation Types
 *
 * A transcript is turned into an ordered list of actions: literal text to
 * type and log, or a key to press.
 */

/** Key name as understood by `xdotool key` */
export type KeyName = string;

export interface EmitText {
    kind: 'emit-text';
    text: string;
}

export interface ExecuteKey {
    kind: 'execute-key';
    key: KeyName;
}

export type SegmentAction = EmitText | ExecuteKey;

export interface CommandMatch {
    key: KeyName;
    count: number;
}

export const emitText = (text: string): EmitText => ({ kind: 'emit-text', text });

export const executeKey = (key: KeyName): ExecuteKey => ({ kind: 'execute-key', key });
