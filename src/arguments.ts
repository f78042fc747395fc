import type * as Cardigantime from '@theunwalked/cardigantime';
import { Command } from 'commander';
import {
    ALLOWED_RECORDERS,
    PROGRAM_NAME,
    TALKTYPE_DEFAULTS,
    VERSION
} from '@/constants';
import { ConfigSchema, SecureConfigSchema } from '@/config';
import type { Args, Config, SecureConfig } from '@/config';
import { getLogger } from '@/logging';
import { ConfigurationError, describeError } from '@/error';
import type { ZodError } from 'zod';

/**
 * The parts of a Cardigantime instance used here: it adds
 * `--config-directory` to the program and reads `config.yaml` from it.
 */
export type ConfigFileReader = Pick<Cardigantime.Cardigantime<typeof ConfigSchema.shape>, 'configure' | 'read'>;

const formatIssues = (error: ZodError): string =>
    error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const createProgram = (): Command => {
    return new Command()
        .name(PROGRAM_NAME)
        .summary('System-wide dictation with a global hotkey')
        .description('Streams microphone audio to live transcription and types the result into the focused window')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .option('--hotkey <hotkey>', 'key that toggles listening (e.g. Alt, F9, ScrollLock)')
        .option('--activation-delay <activationDelay>', 'milliseconds to wait after the hotkey before toggling')
        .option('--model <model>', 'live transcription model')
        .option('--language <language>', 'transcription language')
        .option('--sample-rate <sampleRate>', 'microphone sample rate in Hz')
        .option('--recorder <recorder>', `recording program (${ALLOWED_RECORDERS.join(', ')})`)
        .option('--device <device>', 'capture device passed to the recorder')
        .option('--interim-results', 'request interim results (only final results are typed)')
        .option('--no-typing', 'log transcriptions without typing them')
        .option('--type-delay <typeDelay>', 'delay between typed characters in milliseconds')
        .option('--settle-delay <settleDelay>', 'milliseconds to ignore the hotkey after typing')
        .option('--key-delay <keyDelay>', 'milliseconds to wait after each voice command key press')
        .option('--log-file <logFile>', 'file every transcription line is appended to')
        .option('--save-directory <saveDirectory>', 'directory for saved transcriptions')
        .option('--deepgram-api-key <deepgramApiKey>', 'Deepgram API key');
};

export const configure = async (
    cardigantime: ConfigFileReader,
    argv: string[] = process.argv,
    env: NodeJS.ProcessEnv = process.env
): Promise<[Config, SecureConfig]> => {
    const logger = getLogger();

    let program = createProgram();
    program = await cardigantime.configure(program);
    program.version(VERSION);
    program.parse(argv);

    const cliArgs: Args = program.opts<Args>();

    // Only flags given on the command line override the config file
    const cliValues: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(cliArgs)) {
        if (key !== 'deepgramApiKey' && key !== 'configDirectory' && program.getOptionValueSource(key) === 'cli') {
            cliValues[key] = value;
        }
    }
    logger.debug('Command Line Options: %s', JSON.stringify(cliValues, null, 2));

    const configDirectory = cliArgs.configDirectory ?? TALKTYPE_DEFAULTS.configDirectory;

    // Get values from the config file through Cardigantime
    let fileValues: Partial<Config>;
    try {
        fileValues = await cardigantime.read({ configDirectory });
    } catch (error) {
        throw new ConfigurationError(`Could not read configuration from ${configDirectory}: ${describeError(error)}`);
    }
    logger.debug('Config File Values: %s', JSON.stringify(fileValues, null, 2));

    // Merge configurations: Defaults -> File -> CLI (highest precedence)
    const merged = {
        ...TALKTYPE_DEFAULTS,
        ...fileValues,
        ...cliValues,
        configDirectory,
    };

    const config = ConfigSchema.safeParse(merged);
    if (!config.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(config.error)}`);
    }

    const secureConfig = SecureConfigSchema.safeParse({
        deepgramApiKey: cliArgs.deepgramApiKey ?? env.DEEPGRAM_API_KEY,
    });
    if (!secureConfig.success) {
        throw new ConfigurationError('Deepgram API key is required. Set DEEPGRAM_API_KEY in the environment or a .env file, or pass --deepgram-api-key.');
    }

    logger.debug('Final configuration: %s', JSON.stringify(config.data, null, 2));
    return [config.data, secureConfig.data];
};
