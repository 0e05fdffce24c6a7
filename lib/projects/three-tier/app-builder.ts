/**
 * @format
 * Three-Tier App Builder
 *
 * Builds the CDK app for a deployment configuration: the five tier stacks
 * plus the cross-cutting aspects (tagging, optional cdk-nag).
 * Shared by the CDK entry point and the deployment CLI's in-process synth.
 */

import * as cdk from 'aws-cdk-lib/core';

import {
    applyCdkNag,
    applyCommonSuppressions,
    CompliancePack,
    DEFAULT_OWNER,
    TaggingAspect,
} from '../../aspects';
import { DeploymentConfig } from '../../config/deployment';
import { ProjectStackFamily } from '../../factories/project-interfaces';
import { Tier } from '../../utilities/naming';

import { ThreeTierProjectFactory } from './factory';

/**
 * Options for buildThreeTierApp
 */
export interface BuildAppOptions {
    /** Existing app (the CDK entry point passes its own) @default new cdk.App */
    readonly app?: cdk.App;
    /** Cloud assembly output directory (ignored when `app` is given) */
    readonly outdir?: string;
    /** Run cdk-nag AwsSolutions checks @default false */
    readonly nagChecks?: boolean;
    /** Owner tag @default PROJECT_OWNER or DEFAULT_OWNER */
    readonly owner?: string;
    /** CostCenter tag @default COST_CENTER (omitted when unset) */
    readonly costCenter?: string;
}

/**
 * Result of buildThreeTierApp
 */
export interface ThreeTierApp {
    readonly app: cdk.App;
    readonly family: ProjectStackFamily<Tier>;
}

/**
 * Create the app and all tier stacks for a configuration.
 *
 * @example
 * ```typescript
 * const { app, family } = buildThreeTierApp(resolveDeploymentConfig());
 * const assembly = app.synth();
 * ```
 */
export function buildThreeTierApp(
    config: DeploymentConfig,
    options: BuildAppOptions = {},
): ThreeTierApp {
    const app = options.app ?? new cdk.App(options.outdir ? { outdir: options.outdir } : {});

    const factory = new ThreeTierProjectFactory(config.environment, config.stackPrefix);
    const family = factory.createAllStacks(app, {
        environment: config.environment,
        keyPairName: config.keyPairName,
        ...(config.sshIngressCidr !== undefined && { sshIngressCidr: config.sshIngressCidr }),
    });

    // Tagging — consistent organizational schema across all resources
    const costCenter = options.costCenter ?? process.env.COST_CENTER;
    cdk.Aspects.of(app).add(new TaggingAspect({
        environment: config.environment,
        project: config.stackPrefix,
        owner: options.owner ?? process.env.PROJECT_OWNER ?? DEFAULT_OWNER,
        ...(costCenter ? { costCenter } : {}),
    }));

    if (options.nagChecks) {
        applyCdkNag(app, {
            packs: [CompliancePack.AWS_SOLUTIONS],
            verbose: false,
            reports: false,
        });
        family.stacks.forEach(stack => applyCommonSuppressions(stack));
    }

    return { app, family };
}
