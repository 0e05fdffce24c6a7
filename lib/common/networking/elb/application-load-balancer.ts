/**
 * @format
 * Application Load Balancer Construct
 *
 * One load balancer of the three-tier chain: the internet-facing web ALB in
 * the public subnets or the internal app ALB in the application subnets.
 *
 * Blueprint Pattern:
 * - Network stack owns the security group; the ALB stack imports it and
 *   passes it as a prop
 * - Construct handles ALB creation, its target group and its HTTP listener
 *
 * Tag strategy:
 * - Organizational tags are applied by TaggingAspect at the app level.
 * - Only construct-specific tags are applied: `Component: ALB` and `Name`.
 *
 * Output strategy:
 * - Constructs expose public properties; the ALB stack decides what to export.
 */

import { NagSuppressions } from 'cdk-nag';

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

/** AWS limit for load balancer and target group names */
export const MAX_ELB_NAME_LENGTH = 32;

// =============================================================================
// Props
// =============================================================================

/**
 * Target group options for createTargetGroup.
 *
 * Note: `vpc` is not required — the construct uses the VPC from its own props.
 */
export interface TargetGroupOptions {
    readonly targetGroupName: string;
    readonly port: number;
    readonly healthCheckPath?: string;
}

/**
 * Props for ApplicationLoadBalancerConstruct
 */
export interface ApplicationLoadBalancerConstructProps {
    /** VPC for the load balancer */
    readonly vpc: ec2.IVpc;

    /** Security group for the load balancer (owned by the network stack) */
    readonly securityGroup: ec2.ISecurityGroup;

    /**
     * Load balancer name.
     * Must be 32 characters or fewer (AWS ALB naming limit).
     */
    readonly loadBalancerName: string;

    /** Internet-facing or internal @default true */
    readonly internetFacing?: boolean;
}

function assertElbName(kind: string, name: string): void {
    if (name.length > MAX_ELB_NAME_LENGTH) {
        throw new Error(
            `${kind} name '${name}' exceeds the ${MAX_ELB_NAME_LENGTH}-character AWS limit ` +
            `(${name.length} chars). Shorten the stack prefix.`,
        );
    }
}

// =============================================================================
// Construct
// =============================================================================

/**
 * Application Load Balancer Construct.
 *
 * Exposes `loadBalancer`, `dnsName` and `securityGroup` as public properties.
 * Does NOT create CfnOutput.
 *
 * @example
 * ```typescript
 * const alb = new ApplicationLoadBalancerConstruct(this, 'WebAlb', {
 *     vpc,
 *     securityGroup: webAlbSg,
 *     loadBalancerName: 'three-tier-app-web-alb',
 * });
 * const tg = alb.createTargetGroup('WebTargetGroup', {
 *     targetGroupName: 'three-tier-app-web-tg',
 *     port: 80,
 * });
 * alb.createHttpListener('HttpListener', tg);
 * ```
 */
export class ApplicationLoadBalancerConstruct extends Construct {
    /** The Application Load Balancer */
    public readonly loadBalancer: elbv2.ApplicationLoadBalancer;

    /** The security group (imported from the network stack) */
    public readonly securityGroup: ec2.ISecurityGroup;

    /** VPC reference (stored for use by helper methods) */
    private readonly vpc: ec2.IVpc;

    constructor(scope: Construct, id: string, props: ApplicationLoadBalancerConstructProps) {
        super(scope, id);

        assertElbName('ALB', props.loadBalancerName);

        this.securityGroup = props.securityGroup;
        this.vpc = props.vpc;

        const internetFacing = props.internetFacing ?? true;

        // ========================================
        // APPLICATION LOAD BALANCER
        // ========================================
        this.loadBalancer = new elbv2.ApplicationLoadBalancer(this, 'ALB', {
            vpc: props.vpc,
            loadBalancerName: props.loadBalancerName,
            internetFacing,
            securityGroup: this.securityGroup,
            vpcSubnets: internetFacing
                ? { subnetType: ec2.SubnetType.PUBLIC }
                : { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
            deletionProtection: false,
            idleTimeout: cdk.Duration.seconds(60),
            http2Enabled: true,
            dropInvalidHeaderFields: true,
            desyncMitigationMode: elbv2.DesyncMitigationMode.DEFENSIVE,
        });

        cdk.Tags.of(this.loadBalancer).add('Component', 'ALB');
        cdk.Tags.of(this.loadBalancer).add('Name', props.loadBalancerName);

        // ========================================
        // CDK NAG SUPPRESSIONS
        // ========================================
        NagSuppressions.addResourceSuppressions(
            this.loadBalancer,
            [
                {
                    id: 'AwsSolutions-ELB2',
                    reason: 'Access logs are not collected for the demo tiers',
                },
            ],
            true,
        );
    }

    // =========================================================================
    // HELPER METHODS
    // =========================================================================

    /**
     * Get the load balancer DNS name
     */
    public get dnsName(): string {
        return this.loadBalancer.loadBalancerDnsName;
    }

    /**
     * Create an instance target group with standardized health check.
     * Uses the VPC from the construct's own props.
     */
    public createTargetGroup(
        id: string,
        options: TargetGroupOptions,
    ): elbv2.ApplicationTargetGroup {
        assertElbName('Target group', options.targetGroupName);

        return new elbv2.ApplicationTargetGroup(this, id, {
            vpc: this.vpc,
            targetGroupName: options.targetGroupName,
            port: options.port,
            protocol: elbv2.ApplicationProtocol.HTTP,
            targetType: elbv2.TargetType.INSTANCE,
            healthCheck: {
                path: options.healthCheckPath ?? '/',
                interval: cdk.Duration.seconds(30),
                timeout: cdk.Duration.seconds(5),
                healthyThresholdCount: 2,
                unhealthyThresholdCount: 3,
                protocol: elbv2.Protocol.HTTP,
            },
            deregistrationDelay: cdk.Duration.seconds(60),
        });
    }

    /**
     * Create HTTP listener on port 80 forwarding to the target group.
     * `open: false` leaves ingress to the network stack's security groups.
     */
    public createHttpListener(
        id: string,
        targetGroup: elbv2.ApplicationTargetGroup,
    ): elbv2.ApplicationListener {
        return this.loadBalancer.addListener(id, {
            port: 80,
            protocol: elbv2.ApplicationProtocol.HTTP,
            open: false,
            defaultAction: elbv2.ListenerAction.forward([targetGroup]),
        });
    }
}
