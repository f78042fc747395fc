/**
 * Recorder command lines.
 *
 * Every recorder writes raw signed 16-bit little-endian PCM to stdout.
 */

import type { CaptureConfig, RecorderCommand } from './types';

export const buildRecorderCommand = (config: CaptureConfig): RecorderCommand => {
    const rate = String(config.sampleRate);
    const channels = String(config.channels);

    switch (config.recorder) {
        case 'sox': {
            const input = config.device ? ['-t', 'alsa', config.device] : ['-d'];
            return {
                command: 'sox',
                args: [
                    ...input,
                    '--no-show-progress',
                    '--rate', rate,
                    '--channels', channels,
                    '--encoding', 'signed-integer',
                    '--bits', '16',
                    '--type', 'raw',
                    '-',
                ],
            };
        }
        case 'rec':
            return {
                command: 'rec',
                args: [
                    '-q',
                    '-r', rate,
                    '-c', channels,
                    '-e', 'signed-integer',
                    '-b', '16',
                    '-t', 'raw',
                    '-',
                ],
                ...(config.device ? { env: { AUDIODEV: config.device } } : {}),
            };
        case 'arecord':
            return {
                command: 'arecord',
                args: [
                    '-q',
                    '-r', rate,
                    '-c', channels,
                    '-t', 'raw',
                    '-f', 'S16_LE',
                    ...(config.device ? ['-D', config.device] : []),
                    '-',
                ],
            };
    }
};
