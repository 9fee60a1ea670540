/**
 * Shell Execution Utility
 *
 * Runs a script through `/bin/sh -c` with a hard timeout.
 */

import { spawn, type ChildProcess } from 'child_process';
import type { EventEmitter } from 'events';

import { DEFAULT_SCRIPT_SHELL } from '../config/defaults';

/** Longest delay a single setTimeout honours; Node fires longer ones after 1 ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Signals that make the configurator stop its script before it exits itself */
const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGHUP'];

export interface ShellScriptOptions {
    /** Kill the script after this many milliseconds */
    timeoutMs: number;
    shell?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** 'inherit' passes the script's output through to ours */
    stdio?: 'inherit' | 'ignore';
    /** Emitter of the interrupt signals, defaults to `process` */
    interruptSource?: EventEmitter;
}

export interface ShellScriptResult {
    /** null when the script was killed by a signal or never started */
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    timedOut: boolean;
    /** Signal received by the configurator while the script ran */
    interrupted?: NodeJS.Signals;
    /** Set when the shell itself could not be started */
    spawnError?: Error;
}

/**
 * Whether a finished script counts as successful
 */
export function scriptSucceeded(result: ShellScriptResult): boolean {
    return !result.timedOut && !result.interrupted && !result.spawnError && result.exitCode === 0;
}

/**
 * setTimeout for delays of any length: delays past {@link MAX_TIMER_DELAY_MS}
 * are split into consecutive timers.
 *
 * @returns a function that cancels the pending timer
 */
export function setLongTimeout(callback: () => void, delayMs: number): () => void {
    let timer: NodeJS.Timeout;
    const arm = (remainingMs: number): void => {
        timer = setTimeout(() => {
            if (remainingMs > MAX_TIMER_DELAY_MS) {
                arm(remainingMs - MAX_TIMER_DELAY_MS);
            } else {
                callback();
            }
        }, Math.min(remainingMs, MAX_TIMER_DELAY_MS));
    };
    arm(delayMs);
    return () => clearTimeout(timer);
}

/**
 * Kill the script and everything it started. The shell runs detached, so it
 * leads its own process group; a child such as `sleep` would otherwise
 * outlive the shell.
 */
function killProcessGroup(child: ChildProcess): void {
    if (child.pid === undefined) return;
    try {
        process.kill(-child.pid, 'SIGKILL');
    } catch {
        child.kill('SIGKILL');
    }
}

/**
 * Run a shell script and wait for it to exit or time out.
 *
 * An interrupt signal received meanwhile kills the script's process group and
 * is reported as `interrupted`. Never rejects: spawn failures come back as
 * `spawnError`.
 */
export function runShellScript(script: string, options: ShellScriptOptions): Promise<ShellScriptResult> {
    return new Promise((resolve) => {
        const child = spawn(options.shell ?? DEFAULT_SCRIPT_SHELL, ['-c', script], {
            cwd: options.cwd ?? process.cwd(),
            env: options.env ?? process.env,
            stdio: options.stdio ?? 'inherit',
            detached: true,
        });
        const interruptSource: EventEmitter = options.interruptSource ?? process;

        let timedOut = false;
        let interrupted: NodeJS.Signals | undefined;
        let settled = false;

        const cancelTimer = setLongTimeout(() => {
            timedOut = true;
            killProcessGroup(child);
        }, options.timeoutMs);

        const onInterrupt = (signal: NodeJS.Signals): void => {
            interrupted = signal;
            killProcessGroup(child);
        };
        for (const signal of INTERRUPT_SIGNALS) {
            interruptSource.on(signal, onInterrupt);
        }

        const finish = (result: ShellScriptResult): void => {
            if (settled) return;
            settled = true;
            cancelTimer();
            for (const signal of INTERRUPT_SIGNALS) {
                interruptSource.off(signal, onInterrupt);
            }
            resolve(result);
        };

        child.on('exit', (code, signal) => {
            finish(interrupted ? { exitCode: code, signal, timedOut, interrupted } : { exitCode: code, signal, timedOut });
        });

        child.on('error', (error) => {
            finish({ exitCode: null, signal: null, timedOut: false, spawnError: error });
        });
    });
}
