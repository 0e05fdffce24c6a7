/**
 * Pre-flight Checks
 *
 * Verifies AWS credentials and the EC2 key pair before any stack is touched.
 * Either failure raises a PreflightError and the command exits 1.
 */

import { DescribeKeyPairsCommand, EC2Client } from '@aws-sdk/client-ec2';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';

import { errorMessage, PreflightError } from './errors';
import logger from './logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CallerIdentity {
  account: string;
  arn: string;
}

export interface PreflightClients {
  sts: STSClient;
  ec2: EC2Client;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Mask all but last 4 chars */
export function mask(value: string): string {
  if (value.length <= 4) return value;
  return `***${value.slice(-4)}`;
}

// ---------------------------------------------------------------------------
// 1. Verify AWS Credentials
// ---------------------------------------------------------------------------
export async function verifyCredentials(sts: STSClient): Promise<CallerIdentity> {
  logger.task('Verifying AWS credentials...');

  try {
    const identity = await sts.send(new GetCallerIdentityCommand({}));
    const account = identity.Account ?? '';
    logger.success(`Authenticated to AWS account: ${mask(account)}`);
    return { account, arn: identity.Arn ?? '' };
  } catch (err) {
    logger.info('Troubleshooting:');
    logger.info('  1. Verify AWS credentials are configured');
    logger.info('  2. In CI, check the IAM role trust policy allows GitHub OIDC');
    throw new PreflightError(
      `Cannot retrieve AWS account information: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

// ---------------------------------------------------------------------------
// 2. Verify EC2 key pair
// ---------------------------------------------------------------------------
export async function verifyKeyPair(
  ec2: EC2Client,
  keyPairName: string,
  region: string
): Promise<void> {
  logger.task(`Verifying key pair '${keyPairName}'...`);

  let found = false;
  try {
    const response = await ec2.send(
      new DescribeKeyPairsCommand({ KeyNames: [keyPairName] })
    );
    found = (response.KeyPairs ?? []).some((k) => k.KeyName === keyPairName);
  } catch (err) {
    throw new PreflightError(
      `Key pair '${keyPairName}' not found in ${region}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (!found) {
    throw new PreflightError(`Key pair '${keyPairName}' not found in ${region}`);
  }
  logger.success(`Key pair '${keyPairName}' exists in ${region}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------
export async function runPreflightChecks(
  clients: PreflightClients,
  keyPairName: string,
  region: string
): Promise<CallerIdentity> {
  logger.header('Pre-flight Checks');
  const identity = await verifyCredentials(clients.sts);
  await verifyKeyPair(clients.ec2, keyPairName, region);
  return identity;
}
