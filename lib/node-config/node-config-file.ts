/**
 * @format
 * Node Config File
 *
 * Load, back up and save the node's scylla.yaml. The file must already
 * exist: the image ships a template that the first boot rewrites.
 */

import { readFile, rename, writeFile } from 'fs/promises';

import * as yaml from 'yaml';

import { NODE_CONFIG_BACKUP_SUFFIX } from '../config/defaults';
import { createLogger } from '../utilities/logger';
import { describeError, fail, succeed, type StepResult } from '../utilities/step-result';
import { isPlainObject } from '../utilities/validation';

const log = createLogger('node-config');

/** The node configuration document: config key → value (nested allowed) */
export type NodeConfig = Record<string, unknown>;

const STEP = 'node-config';

/**
 * Path the pristine template is preserved at.
 *
 * @example
 * backupPath('/etc/scylla/scylla.yaml') // → '/etc/scylla/scylla.yaml.example'
 */
export function backupPath(nodeConfigPath: string): string {
    return `${nodeConfigPath}${NODE_CONFIG_BACKUP_SUFFIX}`;
}

/** Turn integers that fit a number back into numbers; larger ones stay `bigint` */
function keepLargeIntegers(_key: unknown, value: unknown): unknown {
    return typeof value === 'bigint' && Number.isSafeInteger(Number(value)) ? Number(value) : value;
}

/**
 * Parse YAML text into a NodeConfig. An empty document is an empty config.
 * Integers beyond the safe range are kept exact as `bigint`.
 *
 * @throws Error when the text is not YAML or its top level is not a mapping
 */
export function parseNodeConfig(text: string): NodeConfig {
    const document: unknown = yaml.parse(text, keepLargeIntegers, { intAsBigInt: true });
    if (document === null || document === undefined) {
        return {};
    }
    if (!isPlainObject(document)) {
        throw new Error(`expected a mapping at the top level, got ${Array.isArray(document) ? 'list' : typeof document}`);
    }
    return document;
}

export function serializeNodeConfig(config: NodeConfig): string {
    return yaml.stringify(config, { indent: 2 });
}

export async function loadNodeConfig(path: string): Promise<StepResult<NodeConfig>> {
    log.debug(`Loading ${path}`);
    try {
        return succeed(parseNodeConfig(await readFile(path, 'utf-8')));
    } catch (error) {
        return fail(STEP, `Unable to load ${path}: ${describeError(error)}`, error);
    }
}

/**
 * Move the current file aside to `<path>.example`, replacing any earlier backup.
 */
export async function backupNodeConfig(path: string): Promise<StepResult<string>> {
    const target = backupPath(path);
    try {
        await rename(path, target);
        log.info(`Preserved original as ${target}`);
        return succeed(target);
    } catch (error) {
        return fail(STEP, `Unable to move ${path} to ${target}: ${describeError(error)}`, error);
    }
}

export async function saveNodeConfig(path: string, config: NodeConfig): Promise<StepResult> {
    log.info(`Saving ${path}`);
    try {
        await writeFile(path, serializeNodeConfig(config), 'utf-8');
        return succeed();
    } catch (error) {
        return fail(STEP, `Unable to write ${path}: ${describeError(error)}`, error);
    }
}
