/**
 * @format
 * Configurator Configuration
 *
 * One explicit settings object, passed to whatever needs it. Resolution
 * order per field:
 *
 *   1. CLI option
 *   2. Environment variable (a `.env` file is loaded by the CLI)
 *   3. Built-in default
 */

import { LogLevel, parseLogLevel } from '../utilities/logger';
import { fail, succeed, type StepResult } from '../utilities/step-result';
import { validateTimeoutSeconds } from '../utilities/validation';
import {
    CLUSTER_NAME_PREFIX,
    DEFAULT_LOG_FILE,
    DEFAULT_METADATA_ENDPOINT,
    DEFAULT_NODE_CONFIG_PATH,
    DEFAULT_SCRIPT_SHELL,
    DEFAULT_SCRIPT_TIMEOUT_SECONDS,
} from './defaults';

export interface ConfiguratorConfig {
    /** scylla.yaml to rewrite */
    readonly nodeConfigPath: string;
    /** Instance metadata service origin */
    readonly metadataEndpoint: string;
    readonly logFile: string;
    readonly logLevel: LogLevel;
    /** Used when user data carries no post_configuration_script_timeout */
    readonly defaultScriptTimeoutSeconds: number;
    readonly scriptShell: string;
    readonly clusterNamePrefix: string;
}

/** Raw CLI option values, as commander hands them over */
export interface ConfiguratorOptions {
    nodeConfig?: string;
    metadataEndpoint?: string;
    logFile?: string;
    logLevel?: string;
    scriptTimeout?: string;
}

/** Environment variables read by {@link resolveConfig} */
export const CONFIG_ENV_VARS = {
    nodeConfigPath: 'SCYLLA_YAML_PATH',
    metadataEndpoint: 'INSTANCE_METADATA_ENDPOINT',
    logFile: 'AMI_LOG_FILE',
    logLevel: 'LOG_LEVEL',
    scriptTimeout: 'POST_CONFIGURATION_SCRIPT_TIMEOUT',
    scriptShell: 'POST_CONFIGURATION_SCRIPT_SHELL',
    clusterNamePrefix: 'CLUSTER_NAME_PREFIX',
} as const;

function pick(option: string | undefined, env: NodeJS.ProcessEnv, name: string): string | undefined {
    if (option !== undefined && option !== '') return option;
    const fromEnv = env[name];
    return fromEnv !== undefined && fromEnv !== '' ? fromEnv : undefined;
}

/**
 * Resolve the configurator settings.
 *
 * Fails on an unknown log level or a timeout that is not a positive integer.
 */
export function resolveConfig(
    options: ConfiguratorOptions = {},
    env: NodeJS.ProcessEnv = process.env,
): StepResult<ConfiguratorConfig> {
    const rawLevel = pick(options.logLevel, env, CONFIG_ENV_VARS.logLevel);
    const logLevel = rawLevel === undefined ? LogLevel.INFO : parseLogLevel(rawLevel);
    if (logLevel === undefined) {
        return fail('config', `Unknown log level: ${rawLevel}. Expected one of error, warn, info, verbose, debug, silent`);
    }

    const rawTimeout = pick(options.scriptTimeout, env, CONFIG_ENV_VARS.scriptTimeout);
    let defaultScriptTimeoutSeconds = DEFAULT_SCRIPT_TIMEOUT_SECONDS;
    if (rawTimeout !== undefined) {
        const timeout = validateTimeoutSeconds(rawTimeout);
        if (!timeout.valid || timeout.value === undefined) {
            return fail('config', timeout.error ?? `Invalid script timeout: ${rawTimeout}`);
        }
        defaultScriptTimeoutSeconds = timeout.value;
    }

    return succeed({
        nodeConfigPath: pick(options.nodeConfig, env, CONFIG_ENV_VARS.nodeConfigPath) ?? DEFAULT_NODE_CONFIG_PATH,
        metadataEndpoint:
            pick(options.metadataEndpoint, env, CONFIG_ENV_VARS.metadataEndpoint) ?? DEFAULT_METADATA_ENDPOINT,
        logFile: pick(options.logFile, env, CONFIG_ENV_VARS.logFile) ?? DEFAULT_LOG_FILE,
        logLevel,
        defaultScriptTimeoutSeconds,
        scriptShell: pick(undefined, env, CONFIG_ENV_VARS.scriptShell) ?? DEFAULT_SCRIPT_SHELL,
        clusterNamePrefix: pick(undefined, env, CONFIG_ENV_VARS.clusterNamePrefix) ?? CLUSTER_NAME_PREFIX,
    });
}
