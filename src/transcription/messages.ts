/**
 * Live transcription message parsing.
 *
 * Only `Results` messages matter here; Metadata, SpeechStarted and
 * UtteranceEnd are ignored.
 */

import { z } from 'zod';
import { describeError } from '../error';
import type { TranscriptEvent } from './types';

const AlternativeSchema = z.object({
    transcript: z.string(),
    confidence: z.number().optional(),
});

export const ResultsMessageSchema = z.object({
    type: z.literal('Results'),
    is_final: z.boolean().optional(),
    speech_final: z.boolean().optional(),
    channel: z.object({
        alternatives: z.array(AlternativeSchema),
    }),
});

const TypedMessageSchema = z.object({
    type: z.string(),
});

export type ParsedMessage =
    | { kind: 'transcript'; event: TranscriptEvent }
    | { kind: 'ignored'; type: string }
    | { kind: 'invalid'; reason: string };

export const parseMessage = (raw: string): ParsedMessage => {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        return { kind: 'invalid', reason: `not JSON: ${describeError(error)}` };
    }

    const typed = TypedMessageSchema.safeParse(data);
    if (!typed.success) {
        return { kind: 'invalid', reason: 'missing message type' };
    }
    if (typed.data.type !== 'Results') {
        return { kind: 'ignored', type: typed.data.type };
    }

    const results = ResultsMessageSchema.safeParse(data);
    if (!results.success) {
        return {
            kind: 'invalid',
            reason: results.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        };
    }

    const alternative = results.data.channel.alternatives[0];
    return {
        kind: 'transcript',
        event: {
            transcript: alternative?.transcript ?? '',
            // Without interim results every Results message is final
            isFinal: results.data.is_final ?? true,
            ...(alternative?.confidence !== undefined ? { confidence: alternative.confidence } : {}),
        },
    };
};

export interface ListenParams {
    model: string;
    language: string;
    sampleRate: number;
    channels: number;
    interimResults: boolean;
}

export const buildListenUrl = (base: string, params: ListenParams): string => {
    const url = new URL(base);
    url.searchParams.set('model', params.model);
    url.searchParams.set('language', params.language);
    url.searchParams.set('punctuate', 'true');
    url.searchParams.set('interim_results', String(params.interimResults));
    url.searchParams.set('encoding', 'linear16');
    url.searchParams.set('sample_rate', String(params.sampleRate));
    url.searchParams.set('channels', String(params.channels));
    return url.toString();
};

export const CLOSE_STREAM_MESSAGE = JSON.stringify({ type: 'CloseStream' });
