/**
 * @format
 * Cross-Stack References
 *
 * Helpers for the parameter-based contract between tier stacks.
 *
 * Each consumer stack declares a `{Producer}StackName` parameter and reads the
 * producer's exports with `Fn::ImportValue`. Stack names are inputs, not
 * synthesis-time references, so each template can be submitted on its own by
 * the deployment CLI (or by `cdk deploy`, using the parameter defaults).
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { NetworkOutput } from '../../stacks/contract';

/**
 * A stack-name parameter and the imports it enables.
 *
 * @example
 * ```typescript
 * const network = new StackNameParameter(this, 'NetworkStackName', {
 *     defaultStackName: 'three-tier-app-network',
 *     description: 'Name of the network stack',
 * });
 * const vpcId = network.importValue('VPCID');
 * ```
 */
export class StackNameParameter {
    /** The CloudFormation parameter (logical ID = parameter key) */
    public readonly parameter: cdk.CfnParameter;

    constructor(
        stack: cdk.Stack,
        parameterKey: string,
        props: { readonly defaultStackName: string; readonly description: string },
    ) {
        this.parameter = new cdk.CfnParameter(stack, parameterKey, {
            type: 'String',
            default: props.defaultStackName,
            description: props.description,
            allowedPattern: '^[a-zA-Z][-a-zA-Z0-9]*$',
            minLength: 1,
            maxLength: 128,
        });
    }

    /** The producer stack name as a token */
    get stackName(): string {
        return this.parameter.valueAsString;
    }

    /**
     * Import an output the producer exported as `{stackName}-{outputKey}`
     */
    importValue(outputKey: string): string {
        return cdk.Fn.importValue(cdk.Fn.join('-', [this.stackName, outputKey]));
    }
}

/**
 * Declare an exported output named `{AWS::StackName}-{outputKey}`.
 *
 * The output's logical ID is the output key; its construct ID is suffixed so
 * that a sibling construct may share the key's name.
 */
export function exportOutput(
    scope: Construct,
    outputKey: string,
    value: string,
    description: string,
): cdk.CfnOutput {
    const output = new cdk.CfnOutput(scope, `${outputKey}Output`, {
        value,
        description,
        exportName: `${cdk.Aws.STACK_NAME}-${outputKey}`,
    });
    output.overrideLogicalId(outputKey);
    return output;
}

/**
 * Rebuild the network stack's VPC from its exports.
 *
 * The network stack always spans exactly two availability zones, selected
 * with Fn::GetAZs in the same order here.
 */
export function importVpc(scope: Construct, id: string, network: StackNameParameter): ec2.IVpc {
    const azs = cdk.Fn.getAzs();

    return ec2.Vpc.fromVpcAttributes(scope, id, {
        vpcId: network.importValue(NetworkOutput.VPC_ID),
        vpcCidrBlock: network.importValue(NetworkOutput.VPC_CIDR),
        availabilityZones: [cdk.Fn.select(0, azs), cdk.Fn.select(1, azs)],
        publicSubnetIds: [
            network.importValue(NetworkOutput.PUBLIC_SUBNET_1),
            network.importValue(NetworkOutput.PUBLIC_SUBNET_2),
        ],
        privateSubnetIds: [
            network.importValue(NetworkOutput.APP_SUBNET_1),
            network.importValue(NetworkOutput.APP_SUBNET_2),
        ],
        isolatedSubnetIds: [
            network.importValue(NetworkOutput.DB_SUBNET_1),
            network.importValue(NetworkOutput.DB_SUBNET_2),
        ],
    });
}

/**
 * Import one of the network stack's security groups.
 * `mutable: false` keeps consumers from adding rules to a group another stack owns.
 */
export function importSecurityGroup(
    scope: Construct,
    id: string,
    network: StackNameParameter,
    outputKey: string,
): ec2.ISecurityGroup {
    return ec2.SecurityGroup.fromSecurityGroupId(scope, id, network.importValue(outputKey), {
        mutable: false,
    });
}
