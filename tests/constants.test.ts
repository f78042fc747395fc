import { describe, expect, test } from 'vitest';
import {
    ALLOWED_RECORDERS,
    DEFAULT_CONFIG_DIR,
    DEFAULT_RECORDER,
    LOG_TIMESTAMP_FORMAT,
    PROGRAM_NAME,
    SAVE_FILENAME_TIMESTAMP_FORMAT,
    TALKTYPE_DEFAULTS,
} from '../src/constants';
import { ConfigSchema } from '../src/config';

describe('constants', () => {
    test('config directory is named after the program', () => {
        expect(DEFAULT_CONFIG_DIR).toBe(`./.${PROGRAM_NAME}`);
    });

    test('default recorder is one of the supported recorders', () => {
        expect(ALLOWED_RECORDERS).toContain(DEFAULT_RECORDER);
    });

    test('defaults satisfy the configuration schema', () => {
        const result = ConfigSchema.safeParse(TALKTYPE_DEFAULTS);

        expect(result.success).toBe(true);
    });

    test('timestamp formats', () => {
        expect(LOG_TIMESTAMP_FORMAT).toBe('YYYY-MM-DD HH:mm:ss');
        expect(SAVE_FILENAME_TIMESTAMP_FORMAT).toBe('YYYYMMDD_HHmmss');
    });
});
