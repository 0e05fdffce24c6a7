/**
 * @format
 * Load Balancer Stack
 *
 * Internet-facing web ALB and internal app ALB, each with an HTTP listener
 * forwarding to an empty instance target group. The web and app tier stacks
 * register their Auto Scaling Groups with these target groups by ARN.
 * Stack name: {prefix}-alb
 */

import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import {
    exportOutput,
    importSecurityGroup,
    importVpc,
    StackNameParameter,
} from '../common/cross-stack/stack-references';
import { ApplicationLoadBalancerConstruct } from '../common/networking/elb/application-load-balancer';
import { resourceName } from '../utilities/naming';

import { LoadBalancerOutput, NetworkOutput, StackParameter } from './contract';
import { HTTP_PORT } from './network-stack';

/** Health check path served by the app tier */
export const APP_HEALTH_CHECK_PATH = '/health';

/**
 * Props for LoadBalancerStack
 */
export interface LoadBalancerStackProps extends cdk.StackProps {
    /** Prefix for load balancer and target group names */
    readonly stackPrefix: string;
    /** Default for the NetworkStackName parameter */
    readonly networkStackName: string;
}

export class LoadBalancerStack extends cdk.Stack {
    /** Internet-facing ALB */
    public readonly webAlb: ApplicationLoadBalancerConstruct;
    /** Internal ALB in front of the app tier */
    public readonly appAlb: ApplicationLoadBalancerConstruct;

    constructor(scope: Construct, id: string, props: LoadBalancerStackProps) {
        super(scope, id, props);

        const { stackPrefix } = props;

        // =====================================================================
        // IMPORTS
        // =====================================================================
        const network = new StackNameParameter(this, StackParameter.NETWORK_STACK_NAME, {
            defaultStackName: props.networkStackName,
            description: 'Name of the network stack whose exports this stack imports',
        });
        const vpc = importVpc(this, 'Vpc', network);

        // =====================================================================
        // WEB (INTERNET-FACING) ALB
        // =====================================================================
        this.webAlb = new ApplicationLoadBalancerConstruct(this, 'WebAlb', {
            vpc,
            securityGroup: importSecurityGroup(
                this,
                'WebAlbSecurityGroup',
                network,
                NetworkOutput.WEB_ALB_SECURITY_GROUP,
            ),
            loadBalancerName: resourceName(stackPrefix, 'web-alb'),
            internetFacing: true,
        });
        const webTargetGroup = this.webAlb.createTargetGroup('WebTargetGroup', {
            targetGroupName: resourceName(stackPrefix, 'web-tg'),
            port: HTTP_PORT,
        });
        this.webAlb.createHttpListener('HttpListener', webTargetGroup);

        // =====================================================================
        // APP (INTERNAL) ALB
        // =====================================================================
        this.appAlb = new ApplicationLoadBalancerConstruct(this, 'AppAlb', {
            vpc,
            securityGroup: importSecurityGroup(
                this,
                'AppAlbSecurityGroup',
                network,
                NetworkOutput.APP_ALB_SECURITY_GROUP,
            ),
            loadBalancerName: resourceName(stackPrefix, 'app-alb'),
            internetFacing: false,
        });
        const appTargetGroup = this.appAlb.createTargetGroup('AppTargetGroup', {
            targetGroupName: resourceName(stackPrefix, 'app-tg'),
            port: HTTP_PORT,
            healthCheckPath: APP_HEALTH_CHECK_PATH,
        });
        this.appAlb.createHttpListener('HttpListener', appTargetGroup);

        // =====================================================================
        // OUTPUTS
        // =====================================================================
        exportOutput(
            this,
            LoadBalancerOutput.DNS_NAME,
            this.webAlb.dnsName,
            'Public DNS name of the internet-facing ALB',
        );
        exportOutput(
            this,
            LoadBalancerOutput.WEB_TARGET_GROUP_ARN,
            webTargetGroup.targetGroupArn,
            'Web tier target group ARN',
        );
        exportOutput(
            this,
            LoadBalancerOutput.APP_DNS_NAME,
            this.appAlb.dnsName,
            'DNS name of the internal ALB',
        );
        exportOutput(
            this,
            LoadBalancerOutput.APP_TARGET_GROUP_ARN,
            appTargetGroup.targetGroupArn,
            'App tier target group ARN',
        );
    }
}
