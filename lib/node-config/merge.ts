/**
 * @format
 * Configuration Merger
 *
 * Layers three sources onto the loaded node configuration:
 *
 *   1. user-data overrides (`scylla_yaml`), always applied
 *   2. defaults: applied for every key the user did not override,
 *      replacing whatever the template held for that key
 *   3. the loaded file: every other key is left untouched
 */

import type { NodeConfig } from './node-config-file';

export interface MergeResult {
    readonly config: NodeConfig;
    /** Keys set from user data, in application order */
    readonly fromUserData: readonly string[];
    /** Keys set from defaults, in application order */
    readonly fromDefaults: readonly string[];
}

// Own-property write, so a key such as '__proto__' stays a plain config key
function setKey(config: NodeConfig, key: string, value: unknown): void {
    Object.defineProperty(config, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Merge overrides and defaults into a copy of `current`.
 *
 * Values are copied as given: scalars, lists and nested mappings alike,
 * with no coercion or validation.
 */
export function mergeNodeConfig(
    current: Readonly<NodeConfig>,
    overrides: Readonly<Record<string, unknown>>,
    defaults: Readonly<Record<string, unknown>>,
): MergeResult {
    const config: NodeConfig = { ...current };
    const fromUserData: string[] = [];
    const fromDefaults: string[] = [];

    for (const [key, value] of Object.entries(overrides)) {
        setKey(config, key, value);
        fromUserData.push(key);
    }

    for (const [key, value] of Object.entries(defaults)) {
        if (!Object.hasOwn(overrides, key)) {
            setKey(config, key, value);
            fromDefaults.push(key);
        }
    }

    return { config, fromUserData, fromDefaults };
}
