/**
 * @format
 * Shell Execution Unit Tests
 *
 * Runs real /bin/sh processes with short timeouts.
 */

import { EventEmitter } from 'events';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { MAX_TIMER_DELAY_MS, runShellScript, scriptSucceeded, setLongTimeout } from '../../../lib/utilities/exec';

describe('runShellScript', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'ami-exec-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should run the script and report exit code 0', async () => {
        const marker = join(dir, 'ran');

        const result = await runShellScript(`touch ${marker}`, { timeoutMs: 5000, stdio: 'ignore' });

        expect(result).toEqual({ exitCode: 0, signal: null, timedOut: false });
        expect(scriptSucceeded(result)).toBe(true);
        expect(existsSync(marker)).toBe(true);
    });

    it('should report a non-zero exit code', async () => {
        const result = await runShellScript('exit 84', { timeoutMs: 5000, stdio: 'ignore' });

        expect(result.exitCode).toBe(84);
        expect(scriptSucceeded(result)).toBe(false);
    });

    it('should kill the script when it exceeds the timeout', async () => {
        const marker = join(dir, 'after-sleep');

        const result = await runShellScript(`sleep 5\ntouch ${marker}`, { timeoutMs: 300, stdio: 'ignore' });

        expect(result.timedOut).toBe(true);
        expect(result.signal).toBe('SIGKILL');
        expect(scriptSucceeded(result)).toBe(false);
        expect(existsSync(marker)).toBe(false);
    });

    it('should pass the environment through', async () => {
        const result = await runShellScript('test "$AMI_TEST_MARKER" = present', {
            timeoutMs: 5000,
            stdio: 'ignore',
            env: { ...process.env, AMI_TEST_MARKER: 'present' },
        });

        expect(result.exitCode).toBe(0);
    });

    it('should report a shell that cannot be started', async () => {
        const result = await runShellScript('true', {
            timeoutMs: 5000,
            stdio: 'ignore',
            shell: join(dir, 'missing-shell'),
        });

        expect(result.spawnError?.message).toMatch(/ENOENT/);
        expect(result.exitCode).toBeNull();
        expect(scriptSucceeded(result)).toBe(false);
    });

    it('should kill the script when the configurator is interrupted', async () => {
        const marker = join(dir, 'after-sleep');
        const signals = new EventEmitter();

        const running = runShellScript(`sleep 5\ntouch ${marker}`, {
            timeoutMs: 10000,
            stdio: 'ignore',
            interruptSource: signals,
        });
        await new Promise((resolve) => setTimeout(resolve, 200));
        signals.emit('SIGTERM', 'SIGTERM');
        const result = await running;

        expect(result).toEqual({ exitCode: null, signal: 'SIGKILL', timedOut: false, interrupted: 'SIGTERM' });
        expect(scriptSucceeded(result)).toBe(false);
        expect(existsSync(marker)).toBe(false);
        expect(signals.listenerCount('SIGTERM')).toBe(0);
    });

    it('should stop listening for interrupts once the script exits', async () => {
        const signals = new EventEmitter();

        await runShellScript('true', { timeoutMs: 5000, stdio: 'ignore', interruptSource: signals });

        expect(signals.listenerCount('SIGTERM')).toBe(0);
        expect(signals.listenerCount('SIGINT')).toBe(0);
        expect(signals.listenerCount('SIGHUP')).toBe(0);
    });

    it('should let a script finish under a timeout longer than one timer can hold', async () => {
        const marker = join(dir, 'after-sleep');

        const result = await runShellScript(`sleep 1\ntouch ${marker}`, {
            timeoutMs: 2592000 * 1000,
            stdio: 'ignore',
        });

        expect(result).toEqual({ exitCode: 0, signal: null, timedOut: false });
        expect(existsSync(marker)).toBe(true);
    });
});

describe('setLongTimeout', () => {
    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should fire a short delay once', () => {
        const callback = jest.fn();

        setLongTimeout(callback, 1000);
        jest.advanceTimersByTime(999);
        expect(callback).not.toHaveBeenCalled();
        jest.advanceTimersByTime(1);

        expect(callback).toHaveBeenCalledTimes(1);
    });

    it('should wait out delays past the single-timer limit', () => {
        const callback = jest.fn();

        setLongTimeout(callback, MAX_TIMER_DELAY_MS + 5000);
        jest.advanceTimersByTime(MAX_TIMER_DELAY_MS);
        expect(callback).not.toHaveBeenCalled();
        jest.advanceTimersByTime(4999);
        expect(callback).not.toHaveBeenCalled();
        jest.advanceTimersByTime(1);

        expect(callback).toHaveBeenCalledTimes(1);
    });

    it('should cancel a chained timer', () => {
        const callback = jest.fn();

        const cancel = setLongTimeout(callback, MAX_TIMER_DELAY_MS * 2);
        jest.advanceTimersByTime(MAX_TIMER_DELAY_MS);
        cancel();
        jest.advanceTimersByTime(MAX_TIMER_DELAY_MS);

        expect(callback).not.toHaveBeenCalled();
    });
});
