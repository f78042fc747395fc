#!/usr/bin/env node
import 'dotenv/config';
import * as Cardigantime from '@theunwalked/cardigantime';
import * as Arguments from '@/arguments';
import { DEFAULT_CHANNELS, DEFAULT_CONFIG_DIR, PROGRAM_NAME, VERSION } from '@/constants';
import { getLogger, setLogLevel } from '@/logging';
import { ConfigurationError, describeError } from '@/error';
import * as Session from '@/session';
import * as Hotkey from '@/hotkey';
import * as Audio from '@/audio';
import * as Transcription from '@/transcription';
import * as Typing from '@/typing';
import * as Output from '@/output';
import * as Dispatch from '@/dispatch';
import * as Indicator from '@/indicator';
import { ConfigSchema } from '@/config';
import type { Config, SecureConfig } from '@/config';

export async function main(): Promise<void> {

    const cardigantime = Cardigantime.create({
        defaults: {
            configDirectory: DEFAULT_CONFIG_DIR,
        },
        configShape: ConfigSchema.shape,
    });

    let config: Config;
    let secureConfig: SecureConfig;
    try {
        [config, secureConfig] = await Arguments.configure(cardigantime);
    } catch (error) {
        getLogger().error('%s', describeError(error));
        process.exitCode = 1;
        return;
    }

    if (config.verbose === true) {
        setLogLevel('verbose');
    }
    if (config.debug === true) {
        setLogLevel('debug');
    }

    const logger = getLogger();

    const state = Session.createState();
    const indicator = Indicator.create({ color: process.stdout.isTTY === true });
    const transcriptLog = Output.create({
        logFile: config.logFile,
        saveDirectory: config.saveDirectory,
    }, indicator.showLine);
    const typist = await Typing.create({
        enabled: config.typing,
        typeDelay: config.typeDelay,
        settleDelay: config.settleDelay,
    }, state);
    const dispatcher = Dispatch.create({ keyDelay: config.keyDelay }, typist, transcriptLog);
    const client = Transcription.create({
        apiKey: secureConfig.deepgramApiKey,
        model: config.model,
        language: config.language,
        sampleRate: config.sampleRate,
        channels: DEFAULT_CHANNELS,
        interimResults: config.interimResults,
    });
    const capture = Audio.create({
        recorder: config.recorder,
        sampleRate: config.sampleRate,
        channels: DEFAULT_CHANNELS,
        ...(config.device ? { device: config.device } : {}),
    });

    const controller = Session.createPipeline(state, {
        client,
        capture,
        onTranscript: (transcript) => {
            dispatcher.handleTranscript(transcript).catch((error: unknown) => {
                logger.error('Error dispatching transcript: %s', describeError(error));
            });
        },
    }, {
        onStatusChange: indicator.setStatus,
    });

    let hotkey: Hotkey.ListenerInstance | null = null;
    try {
        const loaded = await Hotkey.load();
        hotkey = Hotkey.create(loaded.hook, {
            keycodes: loaded.resolve(config.hotkey),
            activationDelay: config.activationDelay,
        }, state, controller);
        hotkey.start();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error('%s', error.message);
            process.exitCode = 1;
            return;
        }
        logger.warn('Global hotkey unavailable (%s); use the t command to toggle listening', describeError(error));
    }

    const shutdown = async (): Promise<void> => {
        if (!state.running) {
            return;
        }
        state.running = false;
        hotkey?.stop();
        await controller.stop();
        await dispatcher.idle();
        indicator.close();
        logger.info('Exiting %s', PROGRAM_NAME);
    };

    const exit = () => {
        shutdown()
            .catch((error: unknown) => {
                logger.error('Error during shutdown: %s', describeError(error));
            })
            .finally(() => process.exit(process.exitCode ?? 0));
    };

    process.on('SIGINT', exit);
    process.on('SIGTERM', exit);

    const rule = '='.repeat(60);
    indicator.showLine(rule);
    indicator.showLine(`${PROGRAM_NAME} ${VERSION}`);
    indicator.showLine(rule);
    indicator.showLine(hotkey
        ? `Press ${config.hotkey} to start or stop listening. Words are typed where your cursor is.`
        : 'Type t and Enter to start or stop listening.');
    indicator.showLine(`  xdotool available: ${typist.isAvailable() ? 'yes' : 'no (log-only mode)'}`);
    indicator.showLine(`  Transcription log: ${config.logFile}`);
    indicator.showLine(Indicator.HELP_TEXT);
    indicator.showLine(rule);

    indicator.start({
        toggle: () => controller.toggle(),
        save: () => transcriptLog.save(),
        clear: () => transcriptLog.clear(),
        entries: () => transcriptLog.entries(),
        quit: async () => exit(),
    });
    indicator.setStatus(controller.getStatus());
}
