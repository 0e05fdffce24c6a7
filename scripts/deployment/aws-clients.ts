/**
 * AWS SDK clients for one region
 */

import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { EC2Client } from '@aws-sdk/client-ec2';
import { STSClient } from '@aws-sdk/client-sts';

export interface AwsClients {
  cloudformation: CloudFormationClient;
  ec2: EC2Client;
  sts: STSClient;
}

export function createAwsClients(region: string): AwsClients {
  return {
    cloudformation: new CloudFormationClient({ region }),
    ec2: new EC2Client({ region }),
    sts: new STSClient({ region }),
  };
}
