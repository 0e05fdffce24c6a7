/**
 * CloudFormation Stack Operations
 *
 * Create, update, delete and inspect the tier stacks through the
 * CloudFormation API. Every mutating call blocks on the matching SDK waiter
 * so that stacks are handled strictly one at a time.
 */

import {
  Capability,
  CloudFormationClient,
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStackEventsCommand,
  DescribeStacksCommand,
  Parameter,
  Tag,
  UpdateStackCommand,
  ValidateTemplateCommand,
  waitUntilStackCreateComplete,
  waitUntilStackDeleteComplete,
  waitUntilStackUpdateComplete,
} from '@aws-sdk/client-cloudformation';

import { errorMessage, FailedEvent, StackOperation, StackOperationError } from './errors';
import logger from './logger';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const FAILURE_STATUSES = new Set([
  'CREATE_FAILED',
  'UPDATE_FAILED',
  'DELETE_FAILED',
]);

const NO_UPDATES_MESSAGE = 'No updates are to be performed';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DeployResult = 'created' | 'updated' | 'unchanged';

export type DestroyResult = 'deleted' | 'skipped';

export interface StackDeployment {
  stackName: string;
  templateBody: string;
  parameters: Record<string, string>;
  tags?: Record<string, string>;
}

export interface ValidationResult {
  /** Parameter keys the template declares */
  parameters: string[];
  description?: string;
}

function toParameters(values: Record<string, string>): Parameter[] {
  return Object.entries(values).map(([ParameterKey, ParameterValue]) => ({
    ParameterKey,
    ParameterValue,
  }));
}

function toTags(values: Record<string, string> = {}): Tag[] {
  return Object.entries(values).map(([Key, Value]) => ({ Key, Value }));
}

function isMissingStack(err: unknown): boolean {
  return errorMessage(err).includes('does not exist');
}

// ---------------------------------------------------------------------------
// Stack deployer
// ---------------------------------------------------------------------------

export class StackDeployer {
  constructor(
    private readonly client: CloudFormationClient,
    private readonly waitTimeoutSeconds: number
  ) {}

  /**
   * Current stack status, or undefined when the stack does not exist
   */
  async getStackStatus(stackName: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(
        new DescribeStacksCommand({ StackName: stackName })
      );
      return response.Stacks?.[0]?.StackStatus;
    } catch (err) {
      if (isMissingStack(err)) {
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Stack outputs keyed by OutputKey (empty when the stack does not exist)
   */
  async getOutputs(stackName: string): Promise<Record<string, string>> {
    try {
      const response = await this.client.send(
        new DescribeStacksCommand({ StackName: stackName })
      );
      const outputs: Record<string, string> = {};
      for (const output of response.Stacks?.[0]?.Outputs ?? []) {
        if (output.OutputKey !== undefined && output.OutputValue !== undefined) {
          outputs[output.OutputKey] = output.OutputValue;
        }
      }
      return outputs;
    } catch (err) {
      if (isMissingStack(err)) {
        return {};
      }
      throw err;
    }
  }

  /**
   * Resource events that ended in a failed status, newest first
   */
  async getFailedEvents(stackName: string): Promise<FailedEvent[]> {
    try {
      const response = await this.client.send(
        new DescribeStackEventsCommand({ StackName: stackName })
      );

      return (response.StackEvents ?? [])
        .filter((e) => FAILURE_STATUSES.has(e.ResourceStatus ?? ''))
        .map((e) => ({
          logicalId: e.LogicalResourceId ?? 'Unknown',
          resourceType: e.ResourceType ?? 'Unknown',
          status: e.ResourceStatus ?? 'Unknown',
          reason: e.ResourceStatusReason ?? 'No reason provided',
          timestamp: e.Timestamp?.toISOString() ?? 'Unknown',
        }));
    } catch (err) {
      logger.warn(`Could not fetch stack events for ${stackName}: ${errorMessage(err)}`);
      return [];
    }
  }

  /**
   * Create the stack, or update it when it already exists.
   *
   * A stack left in ROLLBACK_COMPLETE by a failed first create cannot be
   * updated; it is deleted and created again.
   */
  async deployStack(deployment: StackDeployment): Promise<DeployResult> {
    const { stackName } = deployment;
    let status = await this.getStackStatus(stackName);

    if (status === 'ROLLBACK_COMPLETE') {
      logger.warn(`${stackName} is in ROLLBACK_COMPLETE; deleting before re-creating`);
      await this.deleteStack(stackName);
      status = undefined;
    }

    if (status === undefined) {
      await this.createStack(deployment);
      return 'created';
    }

    return this.updateStack(deployment);
  }

  /**
   * Delete the stack and wait until it is gone. Absent stacks are skipped.
   */
  async deleteStack(stackName: string): Promise<DestroyResult> {
    const status = await this.getStackStatus(stackName);
    if (status === undefined) {
      logger.info(`${stackName} does not exist; skipping`);
      return 'skipped';
    }

    logger.task(`Deleting ${stackName} (${status})...`);
    try {
      await this.client.send(new DeleteStackCommand({ StackName: stackName }));
    } catch (err) {
      throw new StackOperationError(stackName, 'delete', errorMessage(err), { status, cause: err });
    }

    await this.waitFor('delete', stackName, () =>
      waitUntilStackDeleteComplete(this.waiterConfig(), { StackName: stackName })
    );
    logger.success(`Deleted ${stackName}`);
    return 'deleted';
  }

  /**
   * Submit a template to ValidateTemplate.
   *
   * @throws StackOperationError when CloudFormation rejects the template
   */
  async validateTemplate(stackName: string, templateBody: string): Promise<ValidationResult> {
    try {
      const response = await this.client.send(
        new ValidateTemplateCommand({ TemplateBody: templateBody })
      );
      return {
        parameters: (response.Parameters ?? []).flatMap((p) =>
          p.ParameterKey !== undefined ? [p.ParameterKey] : []
        ),
        ...(response.Description !== undefined && { description: response.Description }),
      };
    } catch (err) {
      throw new StackOperationError(stackName, 'validate', errorMessage(err), { cause: err });
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async createStack(deployment: StackDeployment): Promise<void> {
    const { stackName } = deployment;
    logger.task(`Creating ${stackName}...`);

    try {
      await this.client.send(
        new CreateStackCommand({
          StackName: stackName,
          TemplateBody: deployment.templateBody,
          Parameters: toParameters(deployment.parameters),
          Capabilities: [Capability.CAPABILITY_IAM],
          Tags: toTags(deployment.tags),
        })
      );
    } catch (err) {
      throw new StackOperationError(stackName, 'create', errorMessage(err), { cause: err });
    }

    await this.waitFor('create', stackName, () =>
      waitUntilStackCreateComplete(this.waiterConfig(), { StackName: stackName })
    );
    logger.success(`Created ${stackName}`);
  }

  private async updateStack(deployment: StackDeployment): Promise<DeployResult> {
    const { stackName } = deployment;
    logger.task(`Updating ${stackName}...`);

    try {
      await this.client.send(
        new UpdateStackCommand({
          StackName: stackName,
          TemplateBody: deployment.templateBody,
          Parameters: toParameters(deployment.parameters),
          Capabilities: [Capability.CAPABILITY_IAM],
          Tags: toTags(deployment.tags),
        })
      );
    } catch (err) {
      if (errorMessage(err).includes(NO_UPDATES_MESSAGE)) {
        logger.warn(`${stackName}: no updates to perform`);
        return 'unchanged';
      }
      throw new StackOperationError(stackName, 'update', errorMessage(err), { cause: err });
    }

    await this.waitFor('update', stackName, () =>
      waitUntilStackUpdateComplete(this.waiterConfig(), { StackName: stackName })
    );
    logger.success(`Updated ${stackName}`);
    return 'updated';
  }

  private waiterConfig(): { client: CloudFormationClient; maxWaitTime: number } {
    return { client: this.client, maxWaitTime: this.waitTimeoutSeconds };
  }

  /**
   * Run a waiter; on failure collect the stack's failed events and last
   * status into a StackOperationError.
   */
  private async waitFor(
    operation: StackOperation,
    stackName: string,
    wait: () => Promise<unknown>
  ): Promise<void> {
    logger.verbose(`Waiting for ${operation} of ${stackName} (timeout ${this.waitTimeoutSeconds}s)`);
    try {
      await wait();
    } catch (err) {
      const failedEvents = await this.getFailedEvents(stackName);
      const status = await this.getStackStatus(stackName).catch(() => undefined);
      throw new StackOperationError(stackName, operation, errorMessage(err), {
        ...(status !== undefined && { status }),
        failedEvents,
        cause: err,
      });
    }
  }
}
