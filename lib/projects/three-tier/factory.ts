/**
 * @format
 * Three-Tier Project Factory
 *
 * Creates the five tier stacks for one stack prefix.
 *
 * Stacks created (in dependency order):
 * - {prefix}-network:  VPC, subnets, security group chain
 * - {prefix}-database: RDS MySQL
 * - {prefix}-alb:      web (public) and app (internal) load balancers
 * - {prefix}-web:      nginx frontend Auto Scaling Group
 * - {prefix}-app:      backend Auto Scaling Group
 *
 * Stacks do not reference each other at synth time. Each consumer takes the
 * producer's stack name as a parameter (defaulting to the name built here)
 * and imports its exports, so every template can be submitted on its own.
 * The explicit dependencies below only order `cdk deploy --all`.
 */

import * as cdk from 'aws-cdk-lib/core';

import { getThreeTierConfigs } from '../../config/configurations';
import { Environment } from '../../config/environments';
import {
    IProjectFactory,
    ProjectFactoryContext,
    ProjectStackFamily,
} from '../../factories/project-interfaces';
import {
    AppTierStack,
    DatabaseStack,
    LoadBalancerStack,
    NetworkStack,
    WebTierStack,
} from '../../stacks';
import { stackName, Tier } from '../../utilities/naming';
import { assertValid, validateStackPrefix } from '../../utilities/validation';

// =========================================================================
// Factory Context
// =========================================================================

/**
 * Three-tier factory context.
 */
export interface ThreeTierFactoryContext extends ProjectFactoryContext {
    /** Default for the KeyPairName parameter of the web and app stacks */
    readonly keyPairName: string;
    /** CIDR allowed to SSH into the web tier */
    readonly sshIngressCidr?: string;
}

/**
 * Three-tier project factory.
 *
 * @example
 * ```typescript
 * const factory = new ThreeTierProjectFactory(Environment.DEVELOPMENT, 'three-tier-app');
 * const { stackMap } = factory.createAllStacks(app, {
 *     environment: Environment.DEVELOPMENT,
 *     keyPairName: 'sshbastion',
 * });
 * stackMap.network.stackName; // 'three-tier-app-network'
 * ```
 */
export class ThreeTierProjectFactory implements IProjectFactory<ThreeTierFactoryContext, Tier> {
    readonly environment: Environment;
    readonly namespace: string;

    constructor(environment: Environment, stackPrefix: string) {
        assertValid(validateStackPrefix(stackPrefix));
        this.environment = environment;
        this.namespace = stackPrefix;
    }

    /**
     * Stack name for a tier under this factory's prefix
     */
    stackName(tier: Tier): string {
        return stackName(this.namespace, tier);
    }

    createAllStacks(scope: cdk.App, context: ThreeTierFactoryContext): ProjectStackFamily<Tier> {
        const config = getThreeTierConfigs(this.environment);
        const stackPrefix = this.namespace;

        // Templates are submitted straight to the CloudFormation API, so no
        // bootstrap bucket or deployment roles are referenced.
        const common = (tier: Tier, description: string): cdk.StackProps => ({
            stackName: this.stackName(tier),
            description: `${stackPrefix}: ${description}`,
            synthesizer: new cdk.BootstraplessSynthesizer(),
        });

        // =================================================================
        // Stack 1: Network
        // =================================================================
        const network = new NetworkStack(scope, this.stackName('network'), {
            ...common('network', 'VPC, subnets and tier security groups'),
            targetEnvironment: this.environment,
            stackPrefix,
            config: config.network,
            ...(context.sshIngressCidr !== undefined && { sshIngressCidr: context.sshIngressCidr }),
        });

        // =================================================================
        // Stack 2: Database
        // =================================================================
        const database = new DatabaseStack(scope, this.stackName('database'), {
            ...common('database', 'RDS MySQL database'),
            targetEnvironment: this.environment,
            networkStackName: network.stackName,
            config: config.database,
        });
        database.addDependency(network);

        // =================================================================
        // Stack 3: Load balancers
        // =================================================================
        const alb = new LoadBalancerStack(scope, this.stackName('alb'), {
            ...common('alb', 'internet-facing and internal load balancers'),
            stackPrefix,
            networkStackName: network.stackName,
        });
        alb.addDependency(network);

        // =================================================================
        // Stack 4: Web tier
        // =================================================================
        const web = new WebTierStack(scope, this.stackName('web'), {
            ...common('web', 'web tier Auto Scaling Group'),
            targetEnvironment: this.environment,
            stackPrefix,
            networkStackName: network.stackName,
            albStackName: alb.stackName,
            keyPairName: context.keyPairName,
            config: config.web,
        });
        web.addDependency(alb);

        // =================================================================
        // Stack 5: App tier
        // =================================================================
        const app = new AppTierStack(scope, this.stackName('app'), {
            ...common('app', 'app tier Auto Scaling Group'),
            targetEnvironment: this.environment,
            stackPrefix,
            networkStackName: network.stackName,
            albStackName: alb.stackName,
            databaseStackName: database.stackName,
            keyPairName: context.keyPairName,
            config: config.app,
        });
        app.addDependency(alb);
        app.addDependency(database);

        const stacks: cdk.Stack[] = [network, database, alb, web, app];

        cdk.Annotations.of(scope).addInfo(
            `Three-tier factory created ${stacks.length} stacks for ${this.environment} ` +
            `(prefix: ${stackPrefix})`,
        );

        return {
            stacks,
            stackMap: { network, database, alb, web, app },
        };
    }
}
