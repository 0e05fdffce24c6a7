/**
 * @format
 * KeyPairName parameter shared by the web and app tier stacks.
 * Typed as AWS::EC2::KeyPair::KeyName so CloudFormation rejects a key pair
 * that does not exist before creating anything.
 */

import * as cdk from 'aws-cdk-lib/core';

import { StackParameter } from './contract';

export function keyPairParameter(stack: cdk.Stack, defaultKeyPairName: string): cdk.CfnParameter {
    return new cdk.CfnParameter(stack, StackParameter.KEY_PAIR_NAME, {
        type: 'AWS::EC2::KeyPair::KeyName',
        default: defaultKeyPairName,
        description: 'Existing EC2 key pair for SSH access to tier instances',
    });
}
