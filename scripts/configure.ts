#!/usr/bin/env node

/**
 * First-Boot Configurator CLI
 *
 * Runs once when an instance built from the image boots: merges instance
 * metadata, user data and defaults into scylla.yaml, then runs the
 * user-data post-configuration script.
 *
 * Usage:
 *   scylla-ami-configure
 *   scylla-ami-configure --node-config /etc/scylla/scylla.yaml --log-level debug
 *   LOG_LEVEL=verbose scylla-ami-configure --log-file /tmp/ami.log
 *
 * Exit codes:
 *   0 = every step completed
 *   1 = invalid options, unusable log file, or a failed step
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';

import { resolveConfig, type ConfiguratorOptions } from '../lib/config/configurator-config';
import { NodeConfigurator } from '../lib/configurator/node-configurator';
import logger, { configureLogging } from '../lib/utilities/logger';
import { describeError } from '../lib/utilities/step-result';

export function buildProgram(): Command {
  return new Command()
    .name('scylla-ami-configure')
    .description('Configure a database node from instance metadata and user data on first boot')
    .version('1.0.0')
    .option('--node-config <path>', 'scylla.yaml to rewrite (env SCYLLA_YAML_PATH)')
    .option('--metadata-endpoint <url>', 'Instance metadata service origin (env INSTANCE_METADATA_ENDPOINT)')
    .option('--log-file <path>', 'Log file (env AMI_LOG_FILE)')
    .option('--log-level <level>', 'error, warn, info, verbose, debug or silent (env LOG_LEVEL)')
    .option(
      '--script-timeout <seconds>',
      'Default post-configuration script timeout (env POST_CONFIGURATION_SCRIPT_TIMEOUT)',
    );
}

/**
 * Parse arguments, run every step and return the process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  // Load environment variables from .env file
  dotenv.config();

  const program = buildProgram();
  program.parse(argv);

  const config = resolveConfig(program.opts<ConfiguratorOptions>());
  if (!config.ok) {
    logger.fatal(config.error.message);
    return 1;
  }

  try {
    configureLogging({ level: config.value.logLevel, logFile: config.value.logFile });
  } catch (error) {
    logger.fatal(`Unable to open log file ${config.value.logFile}: ${describeError(error)}`);
    return 1;
  }

  const outcome = await new NodeConfigurator(config.value).configure();
  return outcome.ok ? 0 : 1;
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      logger.fatal(`Configurator crashed: ${describeError(err)}`);
      process.exit(1);
    });
}
