/**
 * @format
 * User Data Parser
 *
 * Decodes the JSON blob supplied at instance launch:
 *
 * ```json
 * {
 *   "scylla_yaml": { "cluster_name": "prod", "seed_provider": [...] },
 *   "post_configuration_script": "<base64>",
 *   "post_configuration_script_timeout": 300,
 *   "scylla_startup_args": ["--smp 1"],
 *   "developer_mode": false,
 *   "start_scylla_after_config": false
 * }
 * ```
 *
 * Every key is optional. Empty or malformed user data means "no overrides";
 * parsing never throws.
 */

import { METADATA_PATHS } from '../config/defaults';
import type { MetadataSource } from '../metadata/instance-metadata-client';
import { createLogger } from '../utilities/logger';
import { describeError } from '../utilities/step-result';
import { isPlainObject } from '../utilities/validation';

const log = createLogger('user-data');

/** Top-level user-data keys, as written by operators */
export const USER_DATA_KEYS = {
    scyllaYaml: 'scylla_yaml',
    postConfigurationScript: 'post_configuration_script',
    postConfigurationScriptTimeout: 'post_configuration_script_timeout',
    scyllaStartupArgs: 'scylla_startup_args',
    developerMode: 'developer_mode',
    startScyllaAfterConfig: 'start_scylla_after_config',
} as const;

export interface UserData {
    /** Overrides applied verbatim to the node configuration */
    readonly scyllaYaml: Readonly<Record<string, unknown>>;
    /** Base64-encoded shell script */
    readonly postConfigurationScript?: string;
    /** Raw timeout value; validated when the script runs */
    readonly postConfigurationScriptTimeout?: unknown;
    readonly scyllaStartupArgs?: readonly string[];
    readonly developerMode?: boolean;
    readonly startScyllaAfterConfig?: boolean;
}

export const EMPTY_USER_DATA: UserData = { scyllaYaml: {} };

// =============================================================================
// Field readers: a value of the wrong type is dropped with a warning
// =============================================================================

function readMapping(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined || value === null) return {};
    if (!isPlainObject(value)) {
        log.warn(`Ignoring '${key}': expected a mapping, got ${describeType(value)}`);
        return {};
    }
    return value;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        log.warn(`Ignoring '${key}': expected a string, got ${describeType(value)}`);
        return undefined;
    }
    return value;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
        log.warn(`Ignoring '${key}': expected a boolean, got ${describeType(value)}`);
        return undefined;
    }
    return value;
}

function readStringList(raw: Record<string, unknown>, key: string): string[] | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        log.warn(`Ignoring '${key}': expected a list of strings`);
        return undefined;
    }
    return value;
}

function describeType(value: unknown): string {
    return Array.isArray(value) ? 'list' : typeof value;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a raw user-data body. Empty, malformed or non-object input yields
 * {@link EMPTY_USER_DATA}.
 */
export function parseUserData(body: string): UserData {
    if (body.trim() === '') {
        log.info('No user-data supplied, using defaults');
        return EMPTY_USER_DATA;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(body);
    } catch (error) {
        log.warn(`Error parsing user data: ${describeError(error)}. Will use defaults!`);
        return EMPTY_USER_DATA;
    }

    if (!isPlainObject(raw)) {
        log.warn(`Error parsing user data: expected a JSON object, got ${describeType(raw)}. Will use defaults!`);
        return EMPTY_USER_DATA;
    }

    log.debug(`Got user-data: ${JSON.stringify(raw)}`);

    return {
        scyllaYaml: readMapping(raw, USER_DATA_KEYS.scyllaYaml),
        postConfigurationScript: readString(raw, USER_DATA_KEYS.postConfigurationScript),
        postConfigurationScriptTimeout: raw[USER_DATA_KEYS.postConfigurationScriptTimeout] ?? undefined,
        scyllaStartupArgs: readStringList(raw, USER_DATA_KEYS.scyllaStartupArgs),
        developerMode: readBoolean(raw, USER_DATA_KEYS.developerMode),
        startScyllaAfterConfig: readBoolean(raw, USER_DATA_KEYS.startScyllaAfterConfig),
    };
}

/**
 * Fetch user data (optional) from instance metadata and parse it.
 */
export async function loadUserData(metadata: MetadataSource): Promise<UserData> {
    const result = await metadata.get(METADATA_PATHS.userData, { required: false });
    // Optional lookups only fail when a custom source says so
    if (!result.ok) {
        log.warn(`${result.error.message}. Will use defaults!`);
        return EMPTY_USER_DATA;
    }
    return parseUserData(result.value);
}
