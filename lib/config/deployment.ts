/**
 * @format
 * Deployment Configuration
 *
 * Values that select WHERE and UNDER WHICH NAMES the three tiers are deployed.
 * Shared by the CDK entry point (bin/app.ts) and the deployment CLI.
 *
 * ALL config flows via a single mechanism:
 *   CI:    workflow env: block → process.env
 *   Local: .env file → dotenv → process.env
 * CLI flags override process.env.
 */

import {
    assertValid,
    validateCidr,
    validateKeyPairName,
    validateRegion,
    validateStackPrefix,
} from '../utilities/validation';

import { Environment, resolveEnvironment } from './environments';

/**
 * Resolved deployment configuration
 */
export interface DeploymentConfig {
    /** AWS region the stacks are deployed to */
    readonly region: string;
    /** Prefix for every stack name ({prefix}-{tier}) */
    readonly stackPrefix: string;
    /** Existing EC2 key pair attached to web and app tier instances */
    readonly keyPairName: string;
    /** Sizing/protection profile */
    readonly environment: Environment;
    /** CIDR allowed to SSH into the web tier (unset = no SSH ingress) */
    readonly sshIngressCidr?: string;
    /** Maximum time to wait for a single stack operation */
    readonly waitTimeoutSeconds: number;
}

/**
 * Explicit overrides (CLI flags). Undefined fields fall back to process.env,
 * then to DEPLOYMENT_DEFAULTS.
 */
export interface DeploymentConfigOverrides {
    readonly region?: string;
    readonly stackPrefix?: string;
    readonly keyPairName?: string;
    readonly environment?: string;
    readonly sshIngressCidr?: string;
    /** Seconds; a flag's raw text is validated as is */
    readonly waitTimeoutSeconds?: number | string;
}

export const DEPLOYMENT_DEFAULTS = {
    region: 'us-east-1',
    stackPrefix: 'three-tier-app',
    keyPairName: 'sshbastion',
    waitTimeoutSeconds: 3600,
} as const;

/**
 * Environment variable names read by resolveDeploymentConfig
 */
export const DEPLOYMENT_ENV_VARS = {
    region: 'AWS_REGION',
    stackPrefix: 'STACK_PREFIX',
    keyPairName: 'KEY_PAIR_NAME',
    environment: 'DEPLOY_ENVIRONMENT',
    sshIngressCidr: 'SSH_INGRESS_CIDR',
    waitTimeoutSeconds: 'STACK_WAIT_TIMEOUT_SECONDS',
} as const;

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
    return env[key] || undefined;
}

function parseTimeout(value: string | number): number {
    const seconds = typeof value === 'number' ? value : Number(value);
    if (!Number.isInteger(seconds) || seconds <= 30) {
        throw new Error(`Invalid wait timeout: ${value}. Must be a whole number of seconds greater than 30`);
    }
    return seconds;
}

/**
 * Resolve and validate the deployment configuration.
 *
 * @param overrides - CLI flag values
 * @param env - Environment to read from (defaults to process.env)
 * @throws Error naming the first invalid value
 *
 * @example
 * // AWS_REGION=us-west-2 STACK_PREFIX=myapp
 * resolveDeploymentConfig();
 * // => { region: 'us-west-2', stackPrefix: 'myapp', keyPairName: 'sshbastion', ... }
 */
export function resolveDeploymentConfig(
    overrides: DeploymentConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
): DeploymentConfig {
    const region = overrides.region
        ?? fromEnv(env, DEPLOYMENT_ENV_VARS.region)
        ?? DEPLOYMENT_DEFAULTS.region;
    const stackPrefix = overrides.stackPrefix
        ?? fromEnv(env, DEPLOYMENT_ENV_VARS.stackPrefix)
        ?? DEPLOYMENT_DEFAULTS.stackPrefix;
    const keyPairName = overrides.keyPairName
        ?? fromEnv(env, DEPLOYMENT_ENV_VARS.keyPairName)
        ?? DEPLOYMENT_DEFAULTS.keyPairName;
    const environment = resolveEnvironment(
        overrides.environment ?? fromEnv(env, DEPLOYMENT_ENV_VARS.environment),
    );
    const sshIngressCidr = overrides.sshIngressCidr
        ?? fromEnv(env, DEPLOYMENT_ENV_VARS.sshIngressCidr);
    const waitTimeoutSeconds = parseTimeout(
        overrides.waitTimeoutSeconds
        ?? fromEnv(env, DEPLOYMENT_ENV_VARS.waitTimeoutSeconds)
        ?? DEPLOYMENT_DEFAULTS.waitTimeoutSeconds,
    );

    assertValid(validateRegion(region));
    assertValid(validateStackPrefix(stackPrefix));
    assertValid(validateKeyPairName(keyPairName));
    if (sshIngressCidr !== undefined) {
        assertValid(validateCidr(sshIngressCidr));
    }

    return {
        region,
        stackPrefix,
        keyPairName,
        environment,
        waitTimeoutSeconds,
        ...(sshIngressCidr !== undefined && { sshIngressCidr }),
    };
}
