/**
 * Status Command
 *
 * Prints each tier stack's status and outputs in creation order.
 */

import { DeploymentConfig } from '../../lib/config/deployment';

import { AwsClients } from './aws-clients';
import { StackDeployer } from './cloudformation';
import logger from './logger';
import { creationOrder } from './stacks';

export const NOT_FOUND = 'NOT_FOUND';

export interface StackStatusReport {
  stackName: string;
  status: string;
  outputs: Record<string, string>;
}

export async function statusCommand(
  config: DeploymentConfig,
  clients: AwsClients
): Promise<StackStatusReport[]> {
  logger.header(`Status ${config.stackPrefix} (${config.region})`);
  const deployer = new StackDeployer(clients.cloudformation, config.waitTimeoutSeconds);
  const reports: StackStatusReport[] = [];

  for (const plan of creationOrder(config)) {
    const status = await deployer.getStackStatus(plan.stackName);
    const outputs = status === undefined ? {} : await deployer.getOutputs(plan.stackName);
    reports.push({ stackName: plan.stackName, status: status ?? NOT_FOUND, outputs });
  }

  logger.table(
    ['Stack', 'Status', 'Outputs'],
    reports.map((r) => [
      r.stackName,
      r.status,
      Object.entries(r.outputs).map(([k, v]) => `${k}=${v}`).join(', '),
    ])
  );
  return reports;
}
