#!/usr/bin/env node
/**
 * @format
 * CDK Entry Point
 *
 * Resolves the deployment configuration, creates the five tier stacks and
 * applies cross-cutting aspects.
 *
 * ALL config flows via a single mechanism:
 *   CI:    workflow env: block → process.env
 *   Local: .env file → dotenv → process.env
 * CDK context may override the structural values.
 *
 * Usage:
 *   npx cdk synth
 *   npx cdk synth -c environment=prod -c stackPrefix=myapp
 *   npx cdk synth -c nagChecks=true
 */

import * as dotenv from 'dotenv';

import * as cdk from 'aws-cdk-lib/core';

import { resolveDeploymentConfig } from '../lib/config';
import { buildThreeTierApp } from '../lib/projects/three-tier/app-builder';

dotenv.config();

const app = new cdk.App();

function contextString(key: string): string | undefined {
    const value: unknown = app.node.tryGetContext(key);
    return typeof value === 'string' && value !== '' ? value : undefined;
}

// ============================================================================
// 1. Resolve configuration (context > env vars > defaults)
// ============================================================================

const environment = contextString('environment');
const stackPrefix = contextString('stackPrefix');
const keyPairName = contextString('keyPairName');

const config = resolveDeploymentConfig({
    ...(environment !== undefined && { environment }),
    ...(stackPrefix !== undefined && { stackPrefix }),
    ...(keyPairName !== undefined && { keyPairName }),
});

console.log(`=== Prefix: ${config.stackPrefix} | Environment: ${config.environment} ===`);

// ============================================================================
// 2. Create all stacks + aspects
// ============================================================================

const { family } = buildThreeTierApp(config, {
    app,
    nagChecks: contextString('nagChecks') === 'true',
});

// ============================================================================
// 3. Summary
// ============================================================================

const stackNames = family.stacks.map(s => `  - ${s.stackName}`).join('\n');
console.log(`\nStacks created:\n${stackNames}\n`);
