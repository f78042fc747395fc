/**
 * Transcript Segmenter
 *
 * Splits a transcript on sentence punctuation and separates dictated text
 * from voice commands, preserving order. Punctuation runs are kept as their
 * own tokens so content and separators alternate: content at even indices,
 * separators at odd ones.
 */

import { matchCommand } from './commands';
import { SegmentAction, emitText, executeKey } from './types';

const SEPARATOR_PATTERN = /([.?!,;]+)/;

export const segment = (transcript: string): SegmentAction[] => {
    const parts = transcript.split(SEPARATOR_PATTERN);
    const actions: SegmentAction[] = [];

    let buffer = '';
    let skipNextSeparator = false;

    const flush = () => {
        const text = buffer.trim();
        if (text) {
            actions.push(emitText(text));
        }
        buffer = '';
    };

    parts.forEach((part, index) => {
        if (index % 2 === 1) {
            if (skipNextSeparator) {
                skipNextSeparator = false;
                return;
            }
            buffer += part;
            return;
        }

        if (!part.trim()) {
            return;
        }

        const command = matchCommand(part);
        if (command) {
            flush();
            for (let i = 0; i < command.count; i++) {
                actions.push(executeKey(command.key));
            }
            skipNextSeparator = true;
            return;
        }

        buffer += part;
    });

    flush();
    return actions;
};
