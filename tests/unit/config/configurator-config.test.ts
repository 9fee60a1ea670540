/**
 * @format
 * Configurator Configuration Unit Tests
 */

import { resolveConfig } from '../../../lib/config/configurator-config';
import { LogLevel } from '../../../lib/utilities/logger';

describe('resolveConfig', () => {
    it('should fall back to built-in defaults', () => {
        expect(resolveConfig({}, {})).toEqual({
            ok: true,
            value: {
                nodeConfigPath: '/etc/scylla/scylla.yaml',
                metadataEndpoint: 'http://169.254.169.254',
                logFile: '/var/lib/scylla/logs/ami.log',
                logLevel: LogLevel.INFO,
                defaultScriptTimeoutSeconds: 600,
                scriptShell: '/bin/sh',
                clusterNamePrefix: 'scylladb-cluster',
            },
        });
    });

    it('should read environment variables', () => {
        const result = resolveConfig(
            {},
            {
                SCYLLA_YAML_PATH: '/tmp/scylla.yaml',
                INSTANCE_METADATA_ENDPOINT: 'http://127.0.0.1:1338',
                AMI_LOG_FILE: '/tmp/ami.log',
                LOG_LEVEL: 'debug',
                POST_CONFIGURATION_SCRIPT_TIMEOUT: '30',
                POST_CONFIGURATION_SCRIPT_SHELL: '/bin/bash',
                CLUSTER_NAME_PREFIX: 'lab',
            },
        );

        expect(result).toEqual({
            ok: true,
            value: {
                nodeConfigPath: '/tmp/scylla.yaml',
                metadataEndpoint: 'http://127.0.0.1:1338',
                logFile: '/tmp/ami.log',
                logLevel: LogLevel.DEBUG,
                defaultScriptTimeoutSeconds: 30,
                scriptShell: '/bin/bash',
                clusterNamePrefix: 'lab',
            },
        });
    });

    it('should prefer CLI options over environment variables', () => {
        const result = resolveConfig(
            { nodeConfig: '/opt/scylla.yaml', logLevel: 'warn', scriptTimeout: '45' },
            { SCYLLA_YAML_PATH: '/tmp/scylla.yaml', LOG_LEVEL: 'debug', POST_CONFIGURATION_SCRIPT_TIMEOUT: '30' },
        );

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.nodeConfigPath).toBe('/opt/scylla.yaml');
        expect(result.value.logLevel).toBe(LogLevel.WARN);
        expect(result.value.defaultScriptTimeoutSeconds).toBe(45);
    });

    it('should ignore empty environment variables', () => {
        const result = resolveConfig({}, { SCYLLA_YAML_PATH: '' });

        expect(result.ok && result.value.nodeConfigPath).toBe('/etc/scylla/scylla.yaml');
    });

    it('should reject an unknown log level', () => {
        expect(resolveConfig({ logLevel: 'chatty' }, {})).toEqual({
            ok: false,
            error: {
                step: 'config',
                message: 'Unknown log level: chatty. Expected one of error, warn, info, verbose, debug, silent',
                cause: undefined,
            },
        });
    });

    it('should reject a timeout that is not a positive integer', () => {
        const result = resolveConfig({ scriptTimeout: '0' }, {});

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe('Invalid script timeout: 0. Must be a positive integer');
    });
});
