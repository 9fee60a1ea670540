/**
 * @format
 * Post-Configuration Script Step
 *
 * Runs the base64 shell script from user data after scylla.yaml is written.
 *
 *   - no script                → nothing to do
 *   - script is not base64     → failure
 *   - bad timeout value        → failure
 *   - non-zero exit / signal   → failure
 *   - timeout                  → script's process group killed, failure
 *   - configurator interrupted → script's process group killed, failure
 */

import type { UserData } from '../user-data/user-data';
import { runShellScript, scriptSucceeded, type ShellScriptOptions, type ShellScriptResult } from '../utilities/exec';
import { createLogger } from '../utilities/logger';
import { fail, succeed, type StepResult } from '../utilities/step-result';
import { decodeBase64, validateTimeoutSeconds } from '../utilities/validation';

const log = createLogger('post-configuration');

const STEP = 'post-configuration-script';

export type ScriptRunner = (script: string, options: ShellScriptOptions) => Promise<ShellScriptResult>;

export interface PostConfigurationContext {
    readonly userData: UserData;
    readonly defaultTimeoutSeconds: number;
    readonly shell: string;
    readonly runScript?: ScriptRunner;
    readonly stdio?: 'inherit' | 'ignore';
}

export type PostConfigurationStatus = 'not-configured' | 'empty' | 'completed';

export interface PostConfigurationRun {
    readonly status: PostConfigurationStatus;
    readonly timeoutSeconds?: number;
}

function describeFailure(result: ShellScriptResult, timeoutSeconds: number): string {
    if (result.spawnError) {
        return `unable to start shell: ${result.spawnError.message}`;
    }
    if (result.interrupted) {
        return `interrupted by ${result.interrupted}`;
    }
    if (result.timedOut) {
        return `timed out after ${timeoutSeconds} seconds`;
    }
    if (result.signal) {
        return `killed by ${result.signal}`;
    }
    return `exited with code ${result.exitCode}`;
}

export async function runPostConfigurationScript(
    context: PostConfigurationContext,
): Promise<StepResult<PostConfigurationRun>> {
    const encoded = context.userData.postConfigurationScript;
    if (!encoded) {
        log.debug('No post configuration script supplied');
        return succeed({ status: 'not-configured' });
    }

    const decoded = decodeBase64(encoded);
    if (!decoded.valid || decoded.value === undefined) {
        const message = `Post configuration script failed: ${decoded.error ?? 'undecodable script'}`;
        log.error(message);
        return fail(STEP, message);
    }
    if (decoded.value.trim() === '') {
        log.warn('Post configuration script is empty, nothing to run');
        return succeed({ status: 'empty' });
    }

    const rawTimeout = context.userData.postConfigurationScriptTimeout;
    const timeout = validateTimeoutSeconds(rawTimeout ?? context.defaultTimeoutSeconds);
    if (!timeout.valid || timeout.value === undefined) {
        const message = `Post configuration script failed: ${timeout.error ?? 'invalid timeout'}`;
        log.error(message);
        return fail(STEP, message);
    }
    const timeoutSeconds = timeout.value;

    log.info(`Running post configuration script (timeout ${timeoutSeconds}s):\n${decoded.value}`);
    const runScript = context.runScript ?? runShellScript;
    const result = await runScript(decoded.value, {
        timeoutMs: timeoutSeconds * 1000,
        shell: context.shell,
        stdio: context.stdio,
    });

    if (!scriptSucceeded(result)) {
        const message = `Post configuration script failed: ${describeFailure(result, timeoutSeconds)}`;
        log.error(message);
        return fail(STEP, message, result.spawnError);
    }

    log.info('Post configuration script completed');
    return succeed({ status: 'completed', timeoutSeconds });
}
