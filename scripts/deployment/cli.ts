#!/usr/bin/env node

/**
 * Three-Tier Deployment CLI
 *
 * Deploys, inspects and tears down the five tier stacks directly through the
 * CloudFormation API. Templates are synthesised in-process.
 *
 * Usage:
 *   npm run cli -- deploy
 *   npm run cli -- deploy --stack-prefix myapp --environment prod
 *   npm run cli -- destroy --yes
 *   npm run cli -- status
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';

import {
  DEPLOYMENT_DEFAULTS,
  DEPLOYMENT_ENV_VARS,
  DeploymentConfig,
  resolveDeploymentConfig,
} from '../../lib/config/deployment';

import { createAwsClients } from './aws-clients';
import { deployCommand } from './deploy';
import { destroyCommand } from './destroy';
import { errorMessage, StackOperationError } from './errors';
import { setOutput } from './github';
import { listCommand } from './list';
import logger from './logger';
import { statusCommand } from './status';
import { DEFAULT_SYNTH_OUTDIR, isTemplateFormat, synthCommand } from './synth';
import { validateCommand } from './validate';

// Load environment variables from .env file
dotenv.config();

// =============================================================================
// OPTIONS
// =============================================================================

export interface CliOptions {
  region?: string;
  stackPrefix?: string;
  keyPair?: string;
  environment?: string;
  sshCidr?: string;
  timeout?: string;
}

/**
 * Resolve configuration from CLI flags (then env vars, then defaults)
 */
export function resolveCliConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): DeploymentConfig {
  const config = resolveDeploymentConfig(
    {
      ...(options.region !== undefined && { region: options.region }),
      ...(options.stackPrefix !== undefined && { stackPrefix: options.stackPrefix }),
      ...(options.keyPair !== undefined && { keyPairName: options.keyPair }),
      ...(options.environment !== undefined && { environment: options.environment }),
      ...(options.sshCidr !== undefined && { sshIngressCidr: options.sshCidr }),
      ...(options.timeout !== undefined && { waitTimeoutSeconds: options.timeout }),
    },
    env
  );
  logger.setEnvironment(config.environment);
  return config;
}

function withDeploymentOptions(command: Command): Command {
  return command
    .option('-r, --region <region>', `AWS region (default: ${DEPLOYMENT_DEFAULTS.region})`)
    .option('-p, --stack-prefix <prefix>', `Stack name prefix (default: ${DEPLOYMENT_DEFAULTS.stackPrefix})`)
    .option('-k, --key-pair <name>', `EC2 key pair name (default: ${DEPLOYMENT_DEFAULTS.keyPairName})`)
    .option('-e, --environment <env>', 'Environment (development, staging, production)')
    .option('--ssh-cidr <cidr>', 'CIDR allowed to SSH into the web tier')
    .option('--timeout <seconds>', `Per-stack wait timeout (default: ${DEPLOYMENT_DEFAULTS.waitTimeoutSeconds})`);
}

// =============================================================================
// FAILURE HANDLING
// =============================================================================

function reportFailure(err: unknown): void {
  logger.blank();
  logger.error(errorMessage(err));

  if (err instanceof StackOperationError) {
    if (err.status !== undefined) {
      logger.keyValue('Last status', err.status);
    }
    if (err.failedEvents.length > 0) {
      logger.table(
        ['Resource', 'Type', 'Status', 'Reason'],
        err.failedEvents.map((e) => [e.logicalId, e.resourceType, e.status, e.reason])
      );
    }
  }

  setOutput('status', 'failure');
}

/**
 * Run a command action; any failure is logged and exits 1
 */
async function run(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (err) {
    reportFailure(err);
    process.exit(1);
  }
}

// =============================================================================
// PROGRAM
// =============================================================================

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('three-tier')
    .description('Deploy a three-tier web architecture to AWS with CloudFormation')
    .version('1.0.0')
    .addHelpText(
      'after',
      [
        '',
        'Environment variables (overridden by flags):',
        ...Object.values(DEPLOYMENT_ENV_VARS).map((name) => `  ${name}`),
        '  LOG_LEVEL',
      ].join('\n')
    );

  withDeploymentOptions(
    program
      .command('deploy')
      .description('Create or update all stacks in dependency order')
  ).action(async (options: CliOptions) => {
    await run(async () => {
      const config = resolveCliConfig(options);
      await deployCommand(config, createAwsClients(config.region));
      setOutput('status', 'success');
    });
  });

  withDeploymentOptions(
    program
      .command('destroy')
      .description('Delete all stacks in reverse dependency order')
      .option('-y, --yes', 'Skip confirmation prompts')
  ).action(async (options: CliOptions & { yes?: boolean }) => {
    await run(async () => {
      const config = resolveCliConfig(options);
      await destroyCommand(config, createAwsClients(config.region), {
        ...(options.yes !== undefined && { yes: options.yes }),
      });
    });
  });

  withDeploymentOptions(
    program
      .command('status')
      .description('Show status and outputs of every stack')
  ).action(async (options: CliOptions) => {
    await run(async () => {
      const config = resolveCliConfig(options);
      await statusCommand(config, createAwsClients(config.region));
    });
  });

  withDeploymentOptions(
    program
      .command('validate')
      .description('Validate every synthesised template with CloudFormation')
  ).action(async (options: CliOptions) => {
    await run(async () => {
      const config = resolveCliConfig(options);
      await validateCommand(config, createAwsClients(config.region));
    });
  });

  withDeploymentOptions(
    program
      .command('synth')
      .description('Write the synthesised templates to a directory')
      .option('-o, --outdir <dir>', 'Output directory', DEFAULT_SYNTH_OUTDIR)
      .option('-f, --format <format>', 'Template format (json, yaml)', 'json')
  ).action(async (options: CliOptions & { outdir: string; format: string }) => {
    await run(async () => {
      const { format } = options;
      if (!isTemplateFormat(format)) {
        throw new Error(`Invalid template format: ${format}. Use json or yaml`);
      }
      const config = resolveCliConfig(options);
      await synthCommand(config, { outdir: options.outdir, format });
    });
  });

  withDeploymentOptions(
    program
      .command('list')
      .description('List tiers, stack names, parameters and dependencies')
  ).action(async (options: CliOptions) => {
    await run(async () => {
      listCommand(resolveCliConfig(options));
    });
  });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      logger.error(`Fatal: ${errorMessage(err)}`);
      process.exit(1);
    });
}
