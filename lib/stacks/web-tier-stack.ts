/**
 * @format
 * Web Tier Stack
 *
 * nginx instances in the public subnets behind the internet-facing ALB.
 * Each instance serves a static page and proxies `/api/` to the internal ALB.
 * Stack name: {prefix}-web
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { UserDataBuilder } from '../common/compute/builders/user-data-builder';
import { AutoScalingGroupConstruct } from '../common/compute/constructs/auto-scaling-group';
import { LaunchTemplateConstruct } from '../common/compute/constructs/launch-template';
import {
    exportOutput,
    importSecurityGroup,
    importVpc,
    StackNameParameter,
} from '../common/cross-stack/stack-references';
import { TierComputeConfig } from '../config/configurations';
import { Environment, environmentRemovalPolicy } from '../config/environments';
import { resourceName } from '../utilities/naming';

import {
    LoadBalancerOutput,
    NetworkOutput,
    StackParameter,
    WebTierOutput,
} from './contract';
import { keyPairParameter } from './key-pair-parameter';

/**
 * Props for WebTierStack
 */
export interface WebTierStackProps extends cdk.StackProps {
    /** Target environment */
    readonly targetEnvironment: Environment;
    /** Prefix for resource names */
    readonly stackPrefix: string;
    /** Default for the NetworkStackName parameter */
    readonly networkStackName: string;
    /** Default for the ALBStackName parameter */
    readonly albStackName: string;
    /** Default for the KeyPairName parameter */
    readonly keyPairName: string;
    /** Instance sizing and scaling */
    readonly config: TierComputeConfig;
}

export class WebTierStack extends cdk.Stack {
    /** The web tier Auto Scaling Group */
    public readonly autoScalingGroup: AutoScalingGroupConstruct;

    constructor(scope: Construct, id: string, props: WebTierStackProps) {
        super(scope, id, props);

        const { config } = props;
        const namePrefix = resourceName(props.stackPrefix, 'web');

        // =====================================================================
        // PARAMETERS & IMPORTS
        // =====================================================================
        const network = new StackNameParameter(this, StackParameter.NETWORK_STACK_NAME, {
            defaultStackName: props.networkStackName,
            description: 'Name of the network stack whose exports this stack imports',
        });
        const loadBalancers = new StackNameParameter(this, StackParameter.ALB_STACK_NAME, {
            defaultStackName: props.albStackName,
            description: 'Name of the load balancer stack whose exports this stack imports',
        });
        const keyPair = keyPairParameter(this, props.keyPairName);

        const vpc = importVpc(this, 'Vpc', network);
        const securityGroup = importSecurityGroup(
            this,
            'WebTierSecurityGroup',
            network,
            NetworkOutput.WEB_TIER_SECURITY_GROUP,
        );
        const targetGroup = elbv2.ApplicationTargetGroup.fromTargetGroupAttributes(
            this,
            'WebTargetGroup',
            { targetGroupArn: loadBalancers.importValue(LoadBalancerOutput.WEB_TARGET_GROUP_ARN) },
        );

        // =====================================================================
        // COMPUTE
        //
        // cfn-signal needs the ASG logical ID, so the user data object is
        // created first, the ASG second, and the commands added last.
        // =====================================================================
        const userData = ec2.UserData.forLinux();

        const launchTemplate = new LaunchTemplateConstruct(this, 'LaunchTemplate', {
            securityGroup,
            instanceType: config.instanceType,
            volumeSizeGb: config.volumeSizeGb,
            keyPairName: keyPair.valueAsString,
            detailedMonitoring: config.detailedMonitoring,
            userData,
            namePrefix,
            logRemovalPolicy: environmentRemovalPolicy(props.targetEnvironment),
        });

        this.autoScalingGroup = new AutoScalingGroupConstruct(this, 'AutoScalingGroup', {
            vpc,
            launchTemplate: launchTemplate.launchTemplate,
            minCapacity: config.minCapacity,
            maxCapacity: config.maxCapacity,
            scalingPolicy: { targetCpuUtilization: config.targetCpuUtilization },
            namePrefix,
            subnetSelection: { subnetType: ec2.SubnetType.PUBLIC },
            signalsTimeoutMinutes: config.signalsTimeoutMinutes,
            targetGroup,
        });

        new UserDataBuilder(userData)
            .updateSystem()
            .installNginx()
            .configureWebFrontend({
                apiUpstreamHost: loadBalancers.importValue(LoadBalancerOutput.APP_DNS_NAME),
                title: props.stackPrefix,
            })
            .sendCfnSignal({
                stackName: this.stackName,
                asgLogicalId: this.autoScalingGroup.logicalId,
                region: this.region,
            })
            .addCompletionMarker();

        // =====================================================================
        // OUTPUTS
        // =====================================================================
        exportOutput(
            this,
            WebTierOutput.AUTO_SCALING_GROUP_NAME,
            this.autoScalingGroup.autoScalingGroupName,
            'Web tier Auto Scaling Group name',
        );
    }
}
