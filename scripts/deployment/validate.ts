/**
 * Validate Command
 *
 * Synthesises every template and submits it to CloudFormation
 * ValidateTemplate. Fails when any template is rejected.
 */

import { DeploymentConfig } from '../../lib/config/deployment';

import { AwsClients } from './aws-clients';
import { StackDeployer } from './cloudformation';
import { errorMessage } from './errors';
import logger from './logger';
import { creationOrder } from './stacks';
import { synthesizeTemplates, templateFor } from './templates';

export interface TemplateValidation {
  stackName: string;
  valid: boolean;
  /** Declared parameters, or the rejection message */
  detail: string;
}

export async function validateCommand(
  config: DeploymentConfig,
  clients: AwsClients
): Promise<TemplateValidation[]> {
  logger.header(`Validate ${config.stackPrefix} templates`);
  const plans = creationOrder(config);
  const templates = synthesizeTemplates(config, plans);
  const deployer = new StackDeployer(clients.cloudformation, config.waitTimeoutSeconds);
  const results: TemplateValidation[] = [];

  for (const plan of plans) {
    try {
      const result = await deployer.validateTemplate(
        plan.stackName,
        templateFor(templates, plan.stackName).body
      );
      const params = result.parameters.length > 0 ? result.parameters.join(', ') : '(none)';
      logger.success(`${plan.stackName}: valid (parameters: ${params})`);
      results.push({ stackName: plan.stackName, valid: true, detail: params });
    } catch (err) {
      logger.error(`${plan.stackName}: ${errorMessage(err)}`);
      results.push({ stackName: plan.stackName, valid: false, detail: errorMessage(err) });
    }
  }

  const rejected = results.filter((r) => !r.valid);
  if (rejected.length > 0) {
    throw new Error(`${rejected.length} of ${results.length} templates rejected`);
  }
  return results;
}
