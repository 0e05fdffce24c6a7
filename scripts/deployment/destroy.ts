/**
 * Destroy Command
 *
 * Deletes the tier stacks in the exact reverse of creation order. Absent
 * stacks are skipped; the first failed delete stops the teardown.
 */

import { DeploymentConfig } from '../../lib/config/deployment';
import { Environment } from '../../lib/config/environments';

import { AwsClients } from './aws-clients';
import { DestroyResult, StackDeployer } from './cloudformation';
import logger from './logger';
import { verifyCredentials } from './preflight-checks';
import { confirmDestructiveAction } from './prompts';
import { teardownOrder } from './stacks';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DestroyOptions {
  /** Skip the confirmation prompt */
  yes?: boolean;
  /** Confirmation prompt (inquirer by default) */
  confirm?: (action: string, resourceName: string, environment: Environment) => Promise<boolean>;
}

export interface StackDestroyOutcome {
  stackName: string;
  result: DestroyResult;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------
export async function destroyCommand(
  config: DeploymentConfig,
  clients: AwsClients,
  options: DestroyOptions = {}
): Promise<StackDestroyOutcome[]> {
  logger.header(`Destroy ${config.stackPrefix}`);
  const plans = teardownOrder(config);
  plans.forEach((plan) => logger.listItem(plan.stackName));

  if (!options.yes) {
    const confirm = options.confirm ?? confirmDestructiveAction;
    const confirmed = await confirm(
      `delete ${plans.length} stacks`,
      `${config.stackPrefix}-*`,
      config.environment
    );
    if (!confirmed) {
      logger.warn('Teardown cancelled');
      return [];
    }
  }

  await verifyCredentials(clients.sts);

  const deployer = new StackDeployer(clients.cloudformation, config.waitTimeoutSeconds);
  const outcomes: StackDestroyOutcome[] = [];

  for (const plan of plans) {
    const result = await deployer.deleteStack(plan.stackName);
    outcomes.push({ stackName: plan.stackName, result });
  }

  const deleted = outcomes.filter((o) => o.result === 'deleted').length;
  logger.blank();
  logger.success(`Teardown complete: ${deleted} deleted, ${outcomes.length - deleted} skipped`);
  return outcomes;
}
