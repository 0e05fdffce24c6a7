/**
 * Stack Plan - Single Source of Truth
 *
 * The five tier stacks, their parameters and their ordering for one
 * deployment configuration. Derived from the stack contract so the CLI
 * always passes exactly the parameters each template declares.
 */

import { DeploymentConfig } from '../../lib/config/deployment';
import {
  STACK_NAME_PARAMETER_TIER,
  StackParameter,
  StackParameterKey,
  TIER_PARAMETERS,
} from '../../lib/stacks/contract';
import { stackName, Tier, TIERS } from '../../lib/utilities/naming';

// =============================================================================
// TYPES
// =============================================================================

export interface StackPlan {
  tier: Tier;
  /** Full CloudFormation stack name ({prefix}-{tier}) */
  stackName: string;
  description: string;
  /** Parameter values passed on create/update */
  parameters: Record<string, string>;
  /** Tiers whose exports this stack imports */
  dependsOn: Tier[];
}

const TIER_DESCRIPTIONS: Record<Tier, string> = {
  network: 'VPC, subnets and tier security groups',
  database: 'RDS MySQL database',
  alb: 'Internet-facing and internal load balancers',
  web: 'Web tier Auto Scaling Group (nginx frontend)',
  app: 'App tier Auto Scaling Group (backend)',
};

// =============================================================================
// PLAN
// =============================================================================

function parameterValue(key: StackParameterKey, config: DeploymentConfig): string {
  if (key === StackParameter.KEY_PAIR_NAME) {
    return config.keyPairName;
  }
  return stackName(config.stackPrefix, STACK_NAME_PARAMETER_TIER[key]);
}

function producerTier(key: StackParameterKey): Tier | undefined {
  return key === StackParameter.KEY_PAIR_NAME ? undefined : STACK_NAME_PARAMETER_TIER[key];
}

/**
 * Plan for a single tier
 */
export function planStack(tier: Tier, config: DeploymentConfig): StackPlan {
  const keys = TIER_PARAMETERS[tier];
  const parameters: Record<string, string> = {};
  const dependsOn: Tier[] = [];

  for (const key of keys) {
    parameters[key] = parameterValue(key, config);
    const producer = producerTier(key);
    if (producer !== undefined) {
      dependsOn.push(producer);
    }
  }

  return {
    tier,
    stackName: stackName(config.stackPrefix, tier),
    description: TIER_DESCRIPTIONS[tier],
    parameters,
    dependsOn,
  };
}

/**
 * All stacks in creation order (network, database, alb, web, app)
 */
export function creationOrder(config: DeploymentConfig): StackPlan[] {
  return TIERS.map((tier) => planStack(tier, config));
}

/**
 * All stacks in teardown order: the exact reverse of creation order
 */
export function teardownOrder(config: DeploymentConfig): StackPlan[] {
  return creationOrder(config).reverse();
}
