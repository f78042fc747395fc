import { describe, it, expect } from 'vitest';
import { segment, emitText, executeKey, matchCommand, VOICE_COMMANDS } from '../../src/segment';

const RETURN = executeKey('Return');

describe('segment', () => {
    describe('plain dictation', () => {
        it('should emit a single text action for a transcript without commands', () => {
            expect(segment('Hello, world. How are you?')).toEqual([
                emitText('Hello, world. How are you?'),
            ]);
        });

        it('should trim the emitted text', () => {
            expect(segment('  Hello there  ')).toEqual([emitText('Hello there')]);
        });

        it('should keep the original casing', () => {
            expect(segment('Meet Ada at NASA.')).toEqual([emitText('Meet Ada at NASA.')]);
        });

        it('should produce nothing for an empty transcript', () => {
            expect(segment('')).toEqual([]);
            expect(segment('   ')).toEqual([]);
        });

        it('should not recognise a command inside a longer phrase', () => {
            expect(segment('Press enter now')).toEqual([emitText('Press enter now')]);
        });

        it('should treat a mixed sequence of enter and other words as text', () => {
            expect(segment('enter the room')).toEqual([emitText('enter the room')]);
        });
    });

    describe('commands', () => {
        it('should turn "Enter" into one Return press', () => {
            expect(segment('Enter')).toEqual([RETURN]);
        });

        it('should consume the punctuation after a command', () => {
            expect(segment('Enter.')).toEqual([RETURN]);
        });

        it('should repeat Return once per word for "Enter enter enter"', () => {
            expect(segment('Enter enter enter')).toEqual([RETURN, RETURN, RETURN]);
        });

        it('should handle "enters" inside a repeated command', () => {
            expect(segment('Enters enter')).toEqual([RETURN, RETURN]);
        });

        it.each([
            'Enters',
            'Enter key',
            'Type Enter',
            'Press Enter',
            'New Line',
            'Next Line',
            'next line!',
        ])('should recognise "%s"', (phrase) => {
            expect(segment(phrase)).toEqual([RETURN]);
        });

        it('should produce back-to-back key presses for consecutive commands', () => {
            expect(segment('Enter. Enter.')).toEqual([RETURN, RETURN]);
            expect(segment('Enter, new line')).toEqual([RETURN, RETURN]);
        });
    });

    describe('mixed content', () => {
        it('should flush text before a command', () => {
            expect(segment('Test. Enter.')).toEqual([emitText('Test.'), RETURN]);
        });

        it('should emit remaining text after the last command', () => {
            expect(segment('First line. New line. Second line.')).toEqual([
                emitText('First line.'),
                RETURN,
                emitText('Second line.'),
            ]);
        });

        it('should keep text and commands in spoken order', () => {
            const transcript = 'Test. Test. Test one two. Test. Test one two. Enter. Enter. Enter. Enter. Enter. Enter. Enter. Enter. Still not hitting anything.';

            expect(segment(transcript)).toEqual([
                emitText('Test. Test. Test one two. Test. Test one two.'),
                ...Array.from({ length: 8 }, () => RETURN),
                emitText('Still not hitting anything.'),
            ]);
        });

        it('should only drop the punctuation directly after a command', () => {
            expect(segment('Hello? Enters, then more!')).toEqual([
                emitText('Hello?'),
                RETURN,
                emitText('then more!'),
            ]);
        });

        it('should keep a text-only buffer made of punctuation', () => {
            expect(segment('...')).toEqual([emitText('...')]);
        });
    });
});

describe('matchCommand', () => {
    it('should map every command phrase to Return', () => {
        for (const phrase of VOICE_COMMANDS.keys()) {
            expect(matchCommand(phrase)).toEqual({ key: 'Return', count: 1 });
        }
    });

    it('should ignore case and surrounding whitespace', () => {
        expect(matchCommand('  NEW LINE ')).toEqual({ key: 'Return', count: 1 });
    });

    it('should count repeated enter words', () => {
        expect(matchCommand('enter  enters enter')).toEqual({ key: 'Return', count: 3 });
    });

    it('should return null for non-commands', () => {
        expect(matchCommand('')).toBeNull();
        expect(matchCommand('press enter now')).toBeNull();
        expect(matchCommand('new')).toBeNull();
    });
});
