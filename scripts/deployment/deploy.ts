/**
 * Deploy Command
 *
 * Creates or updates the five tier stacks in creation order, stopping at the
 * first failure. Prints the application URL once the load balancer stack is
 * up and, in GitHub Actions, writes it as the `application_url` step output.
 */

import { DeploymentConfig } from '../../lib/config/deployment';
import { LoadBalancerOutput } from '../../lib/stacks/contract';

import { AwsClients } from './aws-clients';
import { DeployResult, StackDeployer } from './cloudformation';
import { buildProvenanceTags, markdownTable, setOutput, writeSummary } from './github';
import logger from './logger';
import { runPreflightChecks } from './preflight-checks';
import { creationOrder } from './stacks';
import { synthesizeTemplates, templateFor } from './templates';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StackDeployOutcome {
  stackName: string;
  result: DeployResult;
  durationSeconds: number;
}

export interface DeploySummary {
  outcomes: StackDeployOutcome[];
  applicationUrl?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function logConfiguration(config: DeploymentConfig): void {
  logger.keyValue('Region', config.region);
  logger.keyValue('Stack prefix', config.stackPrefix);
  logger.keyValue('Key pair', config.keyPairName);
  logger.keyValue('Environment', config.environment);
  if (config.sshIngressCidr !== undefined) {
    logger.keyValue('SSH ingress', config.sshIngressCidr);
  }
  logger.keyValue('Wait timeout', `${config.waitTimeoutSeconds}s`);
}

function buildDeploySummary(config: DeploymentConfig, summary: DeploySummary): string {
  const rows = summary.outcomes.map((o) => [o.stackName, o.result, `${o.durationSeconds}s`]);
  return [
    `## Three-tier deployment (${config.stackPrefix})`,
    '',
    markdownTable(['Stack', 'Result', 'Duration'], rows),
    summary.applicationUrl !== undefined
      ? `**Application URL:** ${summary.applicationUrl}\n`
      : '_Application URL unavailable_\n',
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------
export async function deployCommand(
  config: DeploymentConfig,
  clients: AwsClients
): Promise<DeploySummary> {
  logger.header(`Deploy ${config.stackPrefix}`);
  logConfiguration(config);

  await runPreflightChecks(clients, config.keyPairName, config.region);

  logger.header('Synthesise Templates');
  const plans = creationOrder(config);
  const templates = synthesizeTemplates(config, plans);
  for (const template of templates.values()) {
    logger.debug(`${template.stackName}: ${template.sizeBytes} bytes`);
  }
  logger.success(`Synthesised ${templates.size} templates`);

  logger.header('Deploy Stacks');
  const deployer = new StackDeployer(clients.cloudformation, config.waitTimeoutSeconds);
  const tags = buildProvenanceTags();
  const outcomes: StackDeployOutcome[] = [];

  for (const plan of plans) {
    const startTime = Date.now();
    logger.debug(`${plan.stackName} parameters: ${JSON.stringify(plan.parameters)}`);

    const result = await deployer.deployStack({
      stackName: plan.stackName,
      templateBody: templateFor(templates, plan.stackName).body,
      parameters: plan.parameters,
      tags,
    });

    outcomes.push({
      stackName: plan.stackName,
      result,
      durationSeconds: Math.round((Date.now() - startTime) / 1000),
    });
  }

  // Application URL from the load balancer stack
  const albPlan = plans.find((p) => p.tier === 'alb');
  const outputs = albPlan ? await deployer.getOutputs(albPlan.stackName) : {};
  const dnsName = outputs[LoadBalancerOutput.DNS_NAME];
  const summary: DeploySummary = {
    outcomes,
    ...(dnsName !== undefined && { applicationUrl: `http://${dnsName}` }),
  };

  logger.blank();
  if (summary.applicationUrl !== undefined) {
    logger.success(`Application URL: ${summary.applicationUrl}`);
    setOutput('application_url', summary.applicationUrl);
  } else {
    logger.warn(`${LoadBalancerOutput.DNS_NAME} output not found; application URL unavailable`);
  }

  writeSummary(buildDeploySummary(config, summary));
  return summary;
}
