/**
 * @format
 * First-Boot Configurator - Central Export
 */

// Orchestration
export {
    NodeConfigurator,
    type ConfigureOutcome,
    type NodeConfiguratorDeps,
    type StepName,
} from './configurator/node-configurator';
export { configureNodeConfig, type NodeConfigSummary } from './configurator/configure-node-config';
export {
    runPostConfigurationScript,
    type PostConfigurationRun,
    type PostConfigurationStatus,
    type ScriptRunner,
} from './configurator/post-configuration-script';

// Configuration
export {
    resolveConfig,
    CONFIG_ENV_VARS,
    type ConfiguratorConfig,
    type ConfiguratorOptions,
} from './config/configurator-config';
export * from './config/defaults';

// Inputs
export {
    InstanceMetadataClient,
    type InstanceMetadataClientOptions,
    type MetadataGetOptions,
    type MetadataSource,
} from './metadata/instance-metadata-client';
export { loadUserData, parseUserData, EMPTY_USER_DATA, USER_DATA_KEYS, type UserData } from './user-data/user-data';

// scylla.yaml
export { mergeNodeConfig, type MergeResult } from './node-config/merge';
export {
    backupPath,
    backupNodeConfig,
    loadNodeConfig,
    parseNodeConfig,
    saveNodeConfig,
    serializeNodeConfig,
    type NodeConfig,
} from './node-config/node-config-file';

// Utilities
export { configureLogging, createLogger, LogLevel, type Logger } from './utilities/logger';
export { runShellScript, type ShellScriptOptions, type ShellScriptResult } from './utilities/exec';
export { fail, succeed, type StepError, type StepResult } from './utilities/step-result';
