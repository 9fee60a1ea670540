/**
 * @format
 * Configuration Merger - Unit Tests
 */

import { mergeNodeConfig } from '../../../lib/node-config/merge';

const DEFAULTS = {
    cluster_name: 'scylladb-cluster-1792396800',
    experimental: false,
    listen_address: '172.16.16.1',
};

describe('mergeNodeConfig', () => {
    it('should apply defaults over the file for keys the user did not set', () => {
        const { config, fromDefaults, fromUserData } = mergeNodeConfig(
            { cluster_name: 'Test Cluster', experimental: true, num_tokens: 256 },
            {},
            DEFAULTS,
        );

        expect(config).toEqual({
            cluster_name: 'scylladb-cluster-1792396800',
            experimental: false,
            num_tokens: 256,
            listen_address: '172.16.16.1',
        });
        expect(fromDefaults).toEqual(['cluster_name', 'experimental', 'listen_address']);
        expect(fromUserData).toEqual([]);
    });

    it('should let user overrides win over defaults', () => {
        const { config, fromDefaults, fromUserData } = mergeNodeConfig(
            { cluster_name: 'Test Cluster' },
            { cluster_name: 'prod', listen_address: '10.0.0.9' },
            DEFAULTS,
        );

        expect(config.cluster_name).toBe('prod');
        expect(config.listen_address).toBe('10.0.0.9');
        expect(config.experimental).toBe(false);
        expect(fromUserData).toEqual(['cluster_name', 'listen_address']);
        expect(fromDefaults).toEqual(['experimental']);
    });

    it('should copy nested values without coercion', () => {
        const seeds = [{ class_name: 'org.apache.cassandra.locator.SimpleSeedProvider', parameters: [{ seeds: '10.0.0.1' }] }];

        const { config } = mergeNodeConfig({}, { seed_provider: seeds, num_tokens: '16' }, {});

        expect(config.seed_provider).toEqual(seeds);
        expect(config.num_tokens).toBe('16');
    });

    it('should leave the input untouched', () => {
        const current = { cluster_name: 'Test Cluster' };

        mergeNodeConfig(current, { cluster_name: 'prod' }, DEFAULTS);

        expect(current).toEqual({ cluster_name: 'Test Cluster' });
    });

    it('should keep keys in file order and append new ones', () => {
        const { config } = mergeNodeConfig({ a: 1, listen_address: 'localhost', b: 2 }, { c: 3 }, DEFAULTS);

        expect(Object.keys(config)).toEqual(['a', 'listen_address', 'b', 'c', 'cluster_name', 'experimental']);
    });

    it('should store a __proto__ override as a plain key', () => {
        const overrides: Record<string, unknown> = JSON.parse('{"__proto__": {"polluted": true}}');

        const { config } = mergeNodeConfig({}, overrides, {});

        expect(Object.keys(config)).toEqual(['__proto__']);
        expect(Object.getPrototypeOf(config)).toBe(Object.prototype);
    });
});
