/**
 * @format
 * Node Config Step
 *
 * Builds this run's defaults from instance metadata, merges them with the
 * user-data overrides into scylla.yaml, preserves the template as
 * `scylla.yaml.example` and writes the result in place.
 *
 * Side effects per successful run: one rename, one write.
 */

import { buildNodeConfigDefaults, METADATA_PATHS } from '../config/defaults';
import type { ConfiguratorConfig } from '../config/configurator-config';
import type { MetadataSource } from '../metadata/instance-metadata-client';
import { mergeNodeConfig } from '../node-config/merge';
import { backupNodeConfig, loadNodeConfig, saveNodeConfig } from '../node-config/node-config-file';
import type { UserData } from '../user-data/user-data';
import { createLogger } from '../utilities/logger';
import { fail, succeed, type StepResult } from '../utilities/step-result';

const log = createLogger('node-config');

export interface NodeConfigStepContext {
    readonly config: ConfiguratorConfig;
    readonly metadata: MetadataSource;
    /** Memoised user data for the run */
    readonly getUserData: () => Promise<UserData>;
    readonly now: Date;
}

export interface NodeConfigSummary {
    readonly path: string;
    readonly backupPath: string;
    readonly privateIp: string;
    readonly fromUserData: readonly string[];
    readonly fromDefaults: readonly string[];
}

function formatValue(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value);
}

export async function configureNodeConfig(context: NodeConfigStepContext): Promise<StepResult<NodeConfigSummary>> {
    const privateIp = await context.metadata.get(METADATA_PATHS.localIpv4, { required: true });
    if (!privateIp.ok) {
        return privateIp;
    }
    if (privateIp.value.trim() === '') {
        return fail('node-config', `Instance metadata returned an empty '${METADATA_PATHS.localIpv4}'`);
    }

    const defaults = buildNodeConfigDefaults({
        privateIp: privateIp.value.trim(),
        clusterNamePrefix: context.config.clusterNamePrefix,
        now: context.now,
    });

    log.info(`Creating ${context.config.nodeConfigPath}...`);
    const loaded = await loadNodeConfig(context.config.nodeConfigPath);
    if (!loaded.ok) {
        return loaded;
    }

    const userData = await context.getUserData();
    const merged = mergeNodeConfig(loaded.value, userData.scyllaYaml, defaults);

    if (merged.fromUserData.length > 0) {
        log.info('Setting params from user-data...');
        for (const key of merged.fromUserData) {
            log.info(`Setting ${key}=${formatValue(merged.config[key])}`);
        }
    }
    log.info('Setting AMI default params...');
    for (const key of merged.fromDefaults) {
        log.info(`Setting ${key}=${formatValue(merged.config[key])}`);
    }

    const backup = await backupNodeConfig(context.config.nodeConfigPath);
    if (!backup.ok) {
        return backup;
    }

    const saved = await saveNodeConfig(context.config.nodeConfigPath, merged.config);
    if (!saved.ok) {
        return saved;
    }

    return succeed({
        path: context.config.nodeConfigPath,
        backupPath: backup.value,
        privateIp: defaults.listen_address,
        fromUserData: merged.fromUserData,
        fromDefaults: merged.fromDefaults,
    });
}
