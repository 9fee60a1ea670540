/**
 * @format
 * Naming Utilities: Single Source of Truth
 *
 * Naming conventions for generated values and metadata URLs.
 *
 * Cluster name pattern: {prefix}-{unix-seconds}
 *   e.g. scylladb-cluster-1792396800
 */

// =============================================================================
// CLUSTER NAMING
// =============================================================================

/**
 * Generate a cluster name unique to the moment the node first booted.
 *
 * @param prefix - Name prefix (e.g. 'scylladb-cluster')
 * @param now - Point in time the name is derived from
 * @returns Cluster name (e.g. 'scylladb-cluster-1792396800')
 *
 * @example
 * generateClusterName('scylladb-cluster', new Date('2026-10-19T08:00:00Z'))
 * // → 'scylladb-cluster-1792396800'
 */
export function generateClusterName(prefix: string, now: Date): string {
    return `${prefix}-${Math.floor(now.getTime() / 1000)}`;
}

// =============================================================================
// METADATA NAMING
// =============================================================================

/**
 * Build an instance metadata URL.
 *
 * Leading and trailing slashes on `path` are dropped so callers may pass
 * either 'meta-data/local-ipv4' or '/meta-data/local-ipv4/'.
 *
 * @example
 * metadataUrl('http://169.254.169.254', 'latest', '/meta-data/local-ipv4')
 * // → 'http://169.254.169.254/latest/meta-data/local-ipv4/'
 */
export function metadataUrl(endpoint: string, apiVersion: string, path: string): string {
    const base = endpoint.replace(/\/+$/, '');
    const trimmed = path.replace(/^\/+/, '').replace(/\/+$/, '');
    return `${base}/${apiVersion}/${trimmed}/`;
}
