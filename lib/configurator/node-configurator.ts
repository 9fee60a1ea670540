/**
 * @format
 * Node Configurator (first-boot orchestrator)
 *
 * Steps, in strict order:
 *
 *   | Step                      | Behaviour                                   |
 *   |---------------------------|---------------------------------------------|
 *   | node-config               | merge defaults + user data into scylla.yaml |
 *   | startup-args              | reserved, logs the requested args only      |
 *   | developer-mode            | reserved, logs the requested mode only      |
 *   | post-configuration-script | run the user-data script under a timeout    |
 *   | start-after-config        | reserved, logs the requested action only    |
 *
 * The first failing step ends the run; later steps are not invoked. The
 * caller turns the outcome into an exit code.
 */

import { AMI_DEFAULTS } from '../config/defaults';
import type { ConfiguratorConfig } from '../config/configurator-config';
import { InstanceMetadataClient, type MetadataSource } from '../metadata/instance-metadata-client';
import { loadUserData, type UserData } from '../user-data/user-data';
import { createLogger } from '../utilities/logger';
import { describeError, fail, succeed, type StepError, type StepResult } from '../utilities/step-result';
import { configureNodeConfig, type NodeConfigSummary } from './configure-node-config';
import {
    runPostConfigurationScript,
    type PostConfigurationRun,
    type ScriptRunner,
} from './post-configuration-script';

const log = createLogger('configurator');

export type StepName =
    | 'node-config'
    | 'startup-args'
    | 'developer-mode'
    | 'post-configuration-script'
    | 'start-after-config';

export interface NodeConfiguratorDeps {
    /** Defaults to an HTTP client for `config.metadataEndpoint` */
    readonly metadata?: MetadataSource;
    readonly runScript?: ScriptRunner;
    readonly clock?: () => Date;
    /** Where the post-configuration script's output goes */
    readonly scriptStdio?: 'inherit' | 'ignore';
}

export type ConfigureOutcome =
    | { readonly ok: true; readonly completedSteps: readonly StepName[] }
    | {
          readonly ok: false;
          readonly failedStep: StepName;
          readonly error: StepError;
          readonly completedSteps: readonly StepName[];
      };

export class NodeConfigurator {
    private readonly metadata: MetadataSource;
    private readonly runScript?: ScriptRunner;
    private readonly clock: () => Date;
    private readonly scriptStdio: 'inherit' | 'ignore';
    private userData?: Promise<UserData>;

    constructor(
        private readonly config: ConfiguratorConfig,
        deps: NodeConfiguratorDeps = {},
    ) {
        this.metadata = deps.metadata ?? new InstanceMetadataClient({ endpoint: config.metadataEndpoint });
        this.runScript = deps.runScript;
        this.clock = deps.clock ?? (() => new Date());
        this.scriptStdio = deps.scriptStdio ?? 'inherit';
    }

    /**
     * User data for this run, fetched on first use and reused afterwards.
     */
    getUserData(): Promise<UserData> {
        if (!this.userData) {
            this.userData = loadUserData(this.metadata);
        }
        return this.userData;
    }

    configureNodeConfig(): Promise<StepResult<NodeConfigSummary>> {
        return configureNodeConfig({
            config: this.config,
            metadata: this.metadata,
            getUserData: () => this.getUserData(),
            now: this.clock(),
        });
    }

    async configureStartupArgs(): Promise<StepResult> {
        const args = (await this.getUserData()).scyllaStartupArgs ?? AMI_DEFAULTS.scyllaStartupArgs;
        log.debug(`Startup arguments requested: ${JSON.stringify(args)} (not applied)`);
        return succeed();
    }

    async setDeveloperMode(): Promise<StepResult> {
        const developerMode = (await this.getUserData()).developerMode ?? AMI_DEFAULTS.developerMode;
        log.debug(`Developer mode requested: ${developerMode} (not applied)`);
        return succeed();
    }

    async runPostConfigurationScript(): Promise<StepResult<PostConfigurationRun>> {
        return runPostConfigurationScript({
            userData: await this.getUserData(),
            defaultTimeoutSeconds: this.config.defaultScriptTimeoutSeconds,
            shell: this.config.scriptShell,
            runScript: this.runScript,
            stdio: this.scriptStdio,
        });
    }

    async startNodeAfterConfig(): Promise<StepResult> {
        const start = (await this.getUserData()).startScyllaAfterConfig ?? AMI_DEFAULTS.startScyllaAfterConfig;
        log.debug(`Start after config requested: ${start} (not applied)`);
        return succeed();
    }

    /**
     * Run every step in order, stopping at the first failure.
     */
    async configure(): Promise<ConfigureOutcome> {
        const steps: ReadonlyArray<readonly [StepName, () => Promise<StepResult<unknown>>]> = [
            ['node-config', () => this.configureNodeConfig()],
            ['startup-args', () => this.configureStartupArgs()],
            ['developer-mode', () => this.setDeveloperMode()],
            ['post-configuration-script', () => this.runPostConfigurationScript()],
            ['start-after-config', () => this.startNodeAfterConfig()],
        ];
        const completedSteps: StepName[] = [];

        for (const [name, run] of steps) {
            const result = await this.runStep(name, run);
            if (!result.ok) {
                log.error(`Configuration stopped at '${name}': ${result.error.message}`);
                return { ok: false, failedStep: name, error: result.error, completedSteps };
            }
            completedSteps.push(name);
        }

        log.info('Configuration completed');
        return { ok: true, completedSteps };
    }

    private async runStep(name: StepName, run: () => Promise<StepResult<unknown>>): Promise<StepResult<unknown>> {
        log.debug(`Running step '${name}'`);
        try {
            return await run();
        } catch (error) {
            return fail(name, `Unexpected error: ${describeError(error)}`, error);
        }
    }
}
