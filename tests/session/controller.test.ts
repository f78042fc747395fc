import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as Session from '../../src/session';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        verbose: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Session controller', () => {
    let state: Session.SessionState;
    let calls: string[];
    let hooks: Session.SessionHooks;
    let statuses: Session.SessionStatus[];

    beforeEach(() => {
        state = Session.createState();
        calls = [];
        statuses = [];
        hooks = {
            start: vi.fn(async () => {
                calls.push('start');
            }),
            stop: vi.fn(async () => {
                calls.push('stop');
            }),
        };
    });

    const createController = () => Session.create(state, hooks, {
        onStatusChange: (status) => statuses.push(status),
    });

    it('should start from idle', async () => {
        const controller = createController();

        await controller.start();

        expect(state.listening).toBe(true);
        expect(controller.getStatus()).toBe('listening');
        expect(calls).toEqual(['start']);
        expect(statuses).toEqual(['listening']);
    });

    it('should ignore start when already listening', async () => {
        const controller = createController();

        await controller.start();
        await controller.start();

        expect(calls).toEqual(['start']);
    });

    it('should ignore stop when idle', async () => {
        const controller = createController();

        await controller.stop();

        expect(hooks.stop).not.toHaveBeenCalled();
        expect(statuses).toEqual([]);
    });

    it('should run start before stop when toggled twice from idle', async () => {
        let finishStart: () => void = () => undefined;
        hooks.start = vi.fn(() => new Promise<void>((resolve) => {
            calls.push('start begun');
            finishStart = () => {
                calls.push('start finished');
                resolve();
            };
        }));
        const controller = createController();

        const first = controller.toggle();
        const second = controller.toggle();
        await vi.waitFor(() => expect(calls).toEqual(['start begun']));
        finishStart();
        await Promise.all([first, second]);

        expect(calls).toEqual(['start begun', 'start finished', 'stop']);
        expect(state.listening).toBe(false);
        expect(statuses).toEqual(['listening', 'idle']);
    });

    it('should run stop before start when toggled twice while listening', async () => {
        const controller = createController();
        await controller.start();
        calls = [];

        controller.toggle();
        await controller.toggle();

        expect(calls).toEqual(['stop', 'start']);
        expect(state.listening).toBe(true);
    });

    it('should return to idle when the start hook fails', async () => {
        hooks.start = vi.fn(async () => {
            throw new Error('connection refused');
        });
        const controller = createController();

        await controller.start();

        expect(state.listening).toBe(false);
        expect(hooks.stop).toHaveBeenCalledTimes(1);
        expect(statuses).toEqual(['listening', 'idle']);
    });

    it('should stay usable after the stop hook fails', async () => {
        hooks.stop = vi.fn(async () => {
            throw new Error('recorder stuck');
        });
        const controller = createController();

        await controller.start();
        await controller.stop();
        await controller.start();

        expect(state.listening).toBe(true);
        expect(hooks.start).toHaveBeenCalledTimes(2);
    });

    it('should not start once shutdown has begun', async () => {
        const controller = createController();
        state.running = false;

        await controller.toggle();

        expect(hooks.start).not.toHaveBeenCalled();
        expect(state.listening).toBe(false);
    });

    it('should resolve settled after queued operations', async () => {
        const controller = createController();

        controller.start();
        controller.stop();
        await controller.settled();

        expect(calls).toEqual(['start', 'stop']);
    });
});
