/**
 * Configuration schema. Values come from defaults, then the config file,
 * then command-line flags; the API key comes from the environment.
 */

import { z } from 'zod';
import type * as Cardigantime from '@theunwalked/cardigantime';
import { ALLOWED_RECORDERS } from './constants';

export type Args = Cardigantime.Args & {
    verbose?: boolean;
    debug?: boolean;
    hotkey?: string;
    activationDelay?: string;
    model?: string;
    language?: string;
    sampleRate?: string;
    recorder?: string;
    device?: string;
    interimResults?: boolean;
    typing?: boolean;
    typeDelay?: string;
    settleDelay?: string;
    keyDelay?: string;
    logFile?: string;
    saveDirectory?: string;
    deepgramApiKey?: string;
};

const milliseconds = z.coerce.number().int().min(0);

export const ConfigSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),
    configDirectory: z.string().min(1),
    hotkey: z.string().min(1),
    activationDelay: milliseconds,
    model: z.string().min(1),
    language: z.string().min(1),
    sampleRate: z.coerce.number().int().positive(),
    recorder: z.enum(ALLOWED_RECORDERS),
    device: z.string().min(1).optional(),
    interimResults: z.boolean(),
    typing: z.boolean(),
    typeDelay: milliseconds,
    settleDelay: milliseconds,
    keyDelay: milliseconds,
    logFile: z.string().min(1),
    saveDirectory: z.string().min(1),
});

export const SecureConfigSchema = z.object({
    deepgramApiKey: z.string().min(1),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;
