/**
 * List Command
 *
 * Prints the tiers, their stack names, parameters and dependencies.
 */

import { DeploymentConfig } from '../../lib/config/deployment';

import logger from './logger';
import { creationOrder, StackPlan } from './stacks';

export function listCommand(config: DeploymentConfig): StackPlan[] {
  const plans = creationOrder(config);

  logger.header(`Stacks for ${config.stackPrefix}`);
  logger.table(
    ['Tier', 'Stack', 'Parameters', 'Depends on'],
    plans.map((p) => [
      p.tier,
      p.stackName,
      Object.entries(p.parameters).map(([k, v]) => `${k}=${v}`).join(', ') || '-',
      p.dependsOn.join(', ') || '-',
    ])
  );
  return plans;
}
