/**
 * In-process Template Synthesis
 *
 * Builds the CDK app for a deployment configuration and returns each tier's
 * CloudFormation template body, ready for CreateStack/UpdateStack.
 * No CDK CLI, bootstrap bucket or asset publishing is involved.
 */

import { DeploymentConfig } from '../../lib/config/deployment';
import { buildThreeTierApp } from '../../lib/projects/three-tier/app-builder';

import { StackPlan } from './stacks';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** CloudFormation limit for an inline TemplateBody */
export const MAX_TEMPLATE_BODY_BYTES = 51_200;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SynthesizedTemplate {
  stackName: string;
  /** Parsed template document */
  template: unknown;
  /** Compact JSON submitted as TemplateBody */
  body: string;
  sizeBytes: number;
}

// ---------------------------------------------------------------------------
// Synthesis
// ---------------------------------------------------------------------------

/**
 * Synthesise the template for every planned stack.
 *
 * @throws Error when a template exceeds the body limit
 */
export function synthesizeTemplates(
  config: DeploymentConfig,
  plans: StackPlan[]
): Map<string, SynthesizedTemplate> {
  const { app } = buildThreeTierApp(config);
  const assembly = app.synth();
  const templates = new Map<string, SynthesizedTemplate>();

  for (const plan of plans) {
    const artifact = assembly.getStackByName(plan.stackName);
    const template: unknown = artifact.template;
    const body = JSON.stringify(template);
    const sizeBytes = Buffer.byteLength(body, 'utf8');
    if (sizeBytes > MAX_TEMPLATE_BODY_BYTES) {
      throw new Error(
        `Template for ${plan.stackName} is ${sizeBytes} bytes; ` +
        `the TemplateBody limit is ${MAX_TEMPLATE_BODY_BYTES} bytes`
      );
    }

    templates.set(plan.stackName, { stackName: plan.stackName, template, body, sizeBytes });
  }

  return templates;
}

/**
 * Look up a synthesised template, failing loudly when the plan and the app
 * disagree on stack names.
 */
export function templateFor(
  templates: Map<string, SynthesizedTemplate>,
  stackName: string
): SynthesizedTemplate {
  const template = templates.get(stackName);
  if (template === undefined) {
    throw new Error(`No synthesised template for ${stackName}`);
  }
  return template;
}
