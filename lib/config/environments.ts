/**
 * @format
 * Environment Configurations
 *
 * Deployment environment identity and shared helpers.
 *
 * Stacks are environment-agnostic (no account/region baked in): the region is
 * chosen when the deployment CLI submits the templates. The environment only
 * selects sizing and protection settings (see configurations.ts).
 *
 * Environment values use FULL NAMES (development, staging, production);
 * short names (dev, prod) are accepted on input and mapped.
 */

import * as cdk from 'aws-cdk-lib/core';

// =============================================================================
// ENVIRONMENT ENUM & RESOLUTION
// =============================================================================

/**
 * Environment enum - centralized definition for all environments.
 *
 * @example
 * import { Environment } from '../lib/config';
 * const env = Environment.DEVELOPMENT;
 */
export enum Environment {
    DEVELOPMENT = 'development',
    STAGING = 'staging',
    PRODUCTION = 'production',
}

/**
 * Mapping from short names to full names.
 * Allows: DEPLOY_ENVIRONMENT=dev OR DEPLOY_ENVIRONMENT=development
 */
const SHORT_TO_FULL: Record<string, Environment> = {
    dev: Environment.DEVELOPMENT,
    stage: Environment.STAGING,
    prod: Environment.PRODUCTION,
};

const FULL_NAMES: readonly string[] = Object.values(Environment);

function isFullName(value: string): value is Environment {
    return FULL_NAMES.includes(value);
}

/**
 * Check if a value names an Environment (full or short name).
 */
export function isValidEnvironment(value: string): boolean {
    return isFullName(value) || value in SHORT_TO_FULL;
}

/**
 * Resolve an environment from user input.
 *
 * @param value - Full or short name; undefined resolves to development
 * @throws Error if the value names no environment
 *
 * @example
 * resolveEnvironment('development') // => Environment.DEVELOPMENT
 * resolveEnvironment('prod')        // => Environment.PRODUCTION
 */
export function resolveEnvironment(value?: string): Environment {
    if (value === undefined || value === '') {
        return Environment.DEVELOPMENT;
    }

    const normalised = value.toLowerCase();
    if (isFullName(normalised)) {
        return normalised;
    }

    const fullName = SHORT_TO_FULL[normalised];
    if (fullName) {
        return fullName;
    }

    throw new Error(
        `Unknown environment '${value}'. Valid environments: ${FULL_NAMES.join(', ')} ` +
        `(or ${Object.keys(SHORT_TO_FULL).join(', ')})`,
    );
}

// =============================================================================
// ENVIRONMENT UTILITY FUNCTIONS
// =============================================================================

/**
 * Check if an environment is production.
 * Use this instead of inline `env === Environment.PRODUCTION` comparisons.
 */
export function isProductionEnvironment(env: Environment): boolean {
    return env === Environment.PRODUCTION;
}

/**
 * Get the CDK removal policy for an environment.
 * Production retains resources; non-production allows destruction.
 */
export function environmentRemovalPolicy(env: Environment): cdk.RemovalPolicy {
    return isProductionEnvironment(env)
        ? cdk.RemovalPolicy.RETAIN
        : cdk.RemovalPolicy.DESTROY;
}
