import { describe, expect, beforeEach, test, vi } from 'vitest';
import type { Command } from 'commander';

vi.mock('../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        verbose: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

import { configure, createProgram } from '../src/arguments';
import { ConfigurationError } from '../src/error';

const env = { DEEPGRAM_API_KEY: 'test-secret' };

// Mock Cardigantime: adds the config directory option and returns file values
let fileValues: Record<string, unknown> = {};
const mockCardigantimeInstance = {
    configure: vi.fn(),
    read: vi.fn(),
};

const argv = (...flags: string[]) => ['node', 'talktype', ...flags];

describe('arguments', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        fileValues = {};
        mockCardigantimeInstance.configure.mockImplementation(async (program: Command) =>
            program.option('-c, --config-directory <configDirectory>', 'configuration directory'));
        mockCardigantimeInstance.read.mockImplementation(async (args: { configDirectory?: string }) => ({
            configDirectory: args.configDirectory,
            ...fileValues,
        }));
    });

    describe('createProgram', () => {
        test('should declare every talktype flag', () => {
            const flags = createProgram().options.map(option => option.long);

            expect(flags).toEqual([
                '--verbose',
                '--debug',
                '--hotkey',
                '--activation-delay',
                '--model',
                '--language',
                '--sample-rate',
                '--recorder',
                '--device',
                '--interim-results',
                '--no-typing',
                '--type-delay',
                '--settle-delay',
                '--key-delay',
                '--log-file',
                '--save-directory',
                '--deepgram-api-key',
            ]);
        });
    });

    describe('configure', () => {
        test('should let Cardigantime add its options and read the config directory', async () => {
            await configure(mockCardigantimeInstance, argv('--config-directory', 'test-config-dir'), env);

            expect(mockCardigantimeInstance.configure).toHaveBeenCalledTimes(1);
            expect(mockCardigantimeInstance.read).toHaveBeenCalledWith({ configDirectory: 'test-config-dir' });
        });

        test('should use defaults when the config file sets nothing', async () => {
            const [config, secureConfig] = await configure(mockCardigantimeInstance, argv(), env);

            expect(mockCardigantimeInstance.read).toHaveBeenCalledWith({ configDirectory: './.talktype' });
            expect(config).toEqual({
                verbose: false,
                debug: false,
                configDirectory: './.talktype',
                hotkey: 'Alt',
                activationDelay: 100,
                model: 'nova-2',
                language: 'en-US',
                sampleRate: 16000,
                recorder: 'arecord',
                interimResults: false,
                typing: true,
                typeDelay: 10,
                settleDelay: 200,
                keyDelay: 50,
                logFile: 'transcriptions.txt',
                saveDirectory: './',
            });
            expect(secureConfig).toEqual({ deepgramApiKey: 'test-secret' });
        });

        test('should apply values from the config file', async () => {
            fileValues = { hotkey: 'F9', recorder: 'sox', device: 'hw:1,0', typeDelay: 25 };

            const [config] = await configure(mockCardigantimeInstance, argv(), env);

            expect(config.hotkey).toBe('F9');
            expect(config.recorder).toBe('sox');
            expect(config.device).toBe('hw:1,0');
            expect(config.typeDelay).toBe(25);
            expect(config.model).toBe('nova-2');
        });

        test('should drop keys the configuration does not know', async () => {
            fileValues = { resolvedConfigDirs: ['./.talktype'], hotkey: 'F9' };

            const [config] = await configure(mockCardigantimeInstance, argv(), env);

            expect(config).not.toHaveProperty('resolvedConfigDirs');
            expect(config.hotkey).toBe('F9');
        });

        test('should let command-line flags override the config file', async () => {
            fileValues = { hotkey: 'F9', typeDelay: 25, language: 'de' };

            const [config] = await configure(mockCardigantimeInstance, argv('--hotkey', 'ScrollLock', '--type-delay', '5'), env);

            expect(config.hotkey).toBe('ScrollLock');
            expect(config.typeDelay).toBe(5);
            expect(config.language).toBe('de');
        });

        test('should turn typing off with --no-typing', async () => {
            fileValues = { typing: true };

            const [config] = await configure(mockCardigantimeInstance, argv('--no-typing'), env);

            expect(config.typing).toBe(false);
        });

        test('should coerce numeric flags', async () => {
            const [config] = await configure(mockCardigantimeInstance, argv('--sample-rate', '48000', '--settle-delay', '0'), env);

            expect(config.sampleRate).toBe(48000);
            expect(config.settleDelay).toBe(0);
        });

        test('should prefer the API key flag over the environment', async () => {
            const [, secureConfig] = await configure(mockCardigantimeInstance, argv('--deepgram-api-key', 'flag-secret'), env);

            expect(secureConfig.deepgramApiKey).toBe('flag-secret');
        });

        test('should require an API key', async () => {
            await expect(configure(mockCardigantimeInstance, argv(), {})).rejects.toThrow(
                'Deepgram API key is required. Set DEEPGRAM_API_KEY in the environment or a .env file, or pass --deepgram-api-key.'
            );
        });

        test('should reject an unsupported recorder', async () => {
            const result = configure(mockCardigantimeInstance, argv('--recorder', 'parec'), env);

            await expect(result).rejects.toBeInstanceOf(ConfigurationError);
            await expect(result).rejects.toThrow(/^Invalid configuration: recorder: /);
        });

        test('should reject a negative delay', async () => {
            await expect(configure(mockCardigantimeInstance, argv('--type-delay=-1'), env)).rejects.toThrow(/^Invalid configuration: typeDelay: /);
        });

        test('should reject invalid values from the config file', async () => {
            fileValues = { sampleRate: -5 };

            await expect(configure(mockCardigantimeInstance, argv(), env)).rejects.toThrow(
                'Invalid configuration: sampleRate: Number must be greater than 0'
            );
        });

        test('should report a config file that cannot be read', async () => {
            mockCardigantimeInstance.read.mockRejectedValue(new Error('bad indentation of a mapping entry'));

            const result = configure(mockCardigantimeInstance, argv(), env);

            await expect(result).rejects.toBeInstanceOf(ConfigurationError);
            await expect(result).rejects.toThrow('Could not read configuration from ./.talktype: bad indentation of a mapping entry');
        });
    });
});
