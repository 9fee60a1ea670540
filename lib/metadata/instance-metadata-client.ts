/**
 * @format
 * Instance Metadata Client
 *
 * Reads values from the link-local instance metadata service:
 *
 *   GET http://169.254.169.254/latest/meta-data/local-ipv4/  → private IPv4
 *   GET http://169.254.169.254/latest/user-data/             → raw launch data
 *
 * Failure policy per call:
 *   - required: logged as CRITICAL, failure result returned
 *   - optional: logged as WARNING, empty string returned
 *
 * No retries; timeouts are undici's defaults.
 */

import { request, type Dispatcher } from 'undici';

import { DEFAULT_METADATA_ENDPOINT, METADATA_API_VERSION } from '../config/defaults';
import { createLogger } from '../utilities/logger';
import { metadataUrl } from '../utilities/naming';
import { describeError, fail, succeed, type StepResult } from '../utilities/step-result';

const log = createLogger('metadata');

export interface MetadataGetOptions {
    /** A required value that cannot be fetched fails the run */
    readonly required: boolean;
}

/**
 * Anything that can answer metadata lookups (the HTTP client, or a fake in tests).
 */
export interface MetadataSource {
    get(path: string, options: MetadataGetOptions): Promise<StepResult<string>>;
}

export interface InstanceMetadataClientOptions {
    /** Service origin, e.g. 'http://169.254.169.254' */
    readonly endpoint?: string;
    /** undici dispatcher (a MockAgent in tests); global dispatcher when omitted */
    readonly dispatcher?: Dispatcher;
}

export class InstanceMetadataClient implements MetadataSource {
    private readonly endpoint: string;
    private readonly dispatcher?: Dispatcher;

    constructor(options: InstanceMetadataClientOptions = {}) {
        this.endpoint = options.endpoint ?? DEFAULT_METADATA_ENDPOINT;
        this.dispatcher = options.dispatcher;
    }

    async get(path: string, options: MetadataGetOptions): Promise<StepResult<string>> {
        const url = metadataUrl(this.endpoint, METADATA_API_VERSION, path);
        log.info(`Getting '${path}'...`);

        try {
            return succeed(await this.fetchText(url));
        } catch (error) {
            const message = `Unable to get '${path}': ${describeError(error)}`;
            if (options.required) {
                log.fatal(message);
                return fail('metadata', message, error);
            }
            log.warn(message);
            return succeed('');
        }
    }

    private async fetchText(url: string): Promise<string> {
        const { statusCode, body } = await request(url, {
            method: 'GET',
            dispatcher: this.dispatcher,
        });

        if (statusCode < 200 || statusCode >= 300) {
            await body.dump();
            throw new Error(`HTTP ${statusCode} from ${url}`);
        }

        const raw = Buffer.from(await body.arrayBuffer());
        return new TextDecoder('utf-8', { fatal: true }).decode(raw);
    }
}
