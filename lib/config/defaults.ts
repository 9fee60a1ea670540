/**
 * @format
 * Default Configuration Values
 *
 * Centralized defaults for the first-boot configurator.
 * Uses UPPER_CASE for global constants.
 */

import { generateClusterName } from '../utilities/naming';

// =============================================================================
// Global Constants - Immutable compile-time values
// =============================================================================

/** Node configuration file shipped with the image */
export const DEFAULT_NODE_CONFIG_PATH = '/etc/scylla/scylla.yaml';

/** Suffix appended to the pristine template when it is replaced */
export const NODE_CONFIG_BACKUP_SUFFIX = '.example';

/** Link-local instance metadata service */
export const DEFAULT_METADATA_ENDPOINT = 'http://169.254.169.254';

/** Metadata API version segment */
export const METADATA_API_VERSION = 'latest';

/** Configurator log directory */
export const DEFAULT_LOG_DIR = '/var/lib/scylla/logs';

/** Configurator log file */
export const DEFAULT_LOG_FILE = `${DEFAULT_LOG_DIR}/ami.log`;

/** Post-configuration script timeout in seconds */
export const DEFAULT_SCRIPT_TIMEOUT_SECONDS = 600;

/** Shell used to run the post-configuration script */
export const DEFAULT_SCRIPT_SHELL = '/bin/sh';

/** Prefix of the generated cluster name */
export const CLUSTER_NAME_PREFIX = 'scylladb-cluster';

/** Snitch matching the cloud the image is built for */
export const DEFAULT_ENDPOINT_SNITCH = 'org.apache.cassandra.locator.Ec2Snitch';

/** Bind RPC on every interface */
export const WILDCARD_RPC_ADDRESS = '0.0.0.0';

const NO_STARTUP_ARGS: readonly string[] = [];

// =============================================================================
// Metadata paths
// =============================================================================

export const METADATA_PATHS = {
    /** Instance private IPv4 address */
    localIpv4: 'meta-data/local-ipv4',
    /** Raw user-supplied launch data */
    userData: 'user-data',
} as const;

// =============================================================================
// Configuration Objects - Grouped defaults using the constants above
// =============================================================================

/**
 * Image-level defaults for the keys user data may carry besides `scylla_yaml`.
 */
export const AMI_DEFAULTS = {
    /** Extra arguments for the node service, e.g. ['--smp 1'] */
    scyllaStartupArgs: NO_STARTUP_ARGS,
    /** Developer mode stays off on production images */
    developerMode: false,
    /** The node service is stopped when the image is built */
    startScyllaAfterConfig: false,
    postConfigurationScriptTimeout: DEFAULT_SCRIPT_TIMEOUT_SECONDS,
} as const;

/**
 * Node configuration defaults, keyed exactly as they appear in scylla.yaml.
 */
export type NodeConfigDefaults = {
    readonly cluster_name: string;
    readonly experimental: boolean;
    readonly auto_bootstrap: boolean;
    readonly listen_address: string;
    readonly broadcast_rpc_address: string;
    readonly endpoint_snitch: string;
    readonly rpc_address: string;
};

export interface NodeConfigDefaultsOptions {
    /** Private IP resolved from instance metadata */
    readonly privateIp: string;
    readonly clusterNamePrefix?: string;
    readonly now?: Date;
}

/**
 * Build the node configuration defaults for this run.
 *
 * The two network addresses and the cluster name are only known at run time,
 * so the mapping is rebuilt on every call rather than mutated in place.
 */
export function buildNodeConfigDefaults(options: NodeConfigDefaultsOptions): NodeConfigDefaults {
    return {
        cluster_name: generateClusterName(options.clusterNamePrefix ?? CLUSTER_NAME_PREFIX, options.now ?? new Date()),
        experimental: false,
        auto_bootstrap: false,
        listen_address: options.privateIp,
        broadcast_rpc_address: options.privateIp,
        endpoint_snitch: DEFAULT_ENDPOINT_SNITCH,
        rpc_address: WILDCARD_RPC_ADDRESS,
    };
}
