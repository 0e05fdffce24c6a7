/**
 * @format
 * Auto Scaling Group Construct
 *
 * Auto Scaling Group for a web or app tier. ONLY accepts a LaunchTemplate
 * from the stack.
 *
 * Features:
 * - CPU-based target tracking scaling policy
 * - Rolling update policy gated on cfn-signal
 * - ELB health checks once attached to a target group
 *
 * Tag strategy:
 * Only `Component: AutoScalingGroup` is applied here. Organizational tags
 * come from TaggingAspect at app level.
 */

import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

/** Health check grace period, scaling cooldown and instance warmup */
const INSTANCE_SETTLE_TIME = cdk.Duration.minutes(5);

/**
 * Scaling policy configuration
 */
export interface ScalingPolicyConfiguration {
    /** Target CPU utilization percentage @default 70 */
    readonly targetCpuUtilization?: number;
}

/**
 * Props for AutoScalingGroupConstruct
 */
export interface AutoScalingGroupConstructProps {
    /** The VPC where the ASG will be launched */
    readonly vpc: ec2.IVpc;

    /** Launch Template created by the stack */
    readonly launchTemplate: ec2.ILaunchTemplate;

    /** Minimum capacity @default 1 */
    readonly minCapacity?: number;

    /** Maximum capacity @default 2 */
    readonly maxCapacity?: number;

    /** Scaling policy configuration */
    readonly scalingPolicy?: ScalingPolicyConfiguration;

    /** Name prefix for resources, e.g. 'three-tier-app-web' */
    readonly namePrefix: string;

    /** Subnet selection @default PRIVATE_WITH_EGRESS */
    readonly subnetSelection?: ec2.SubnetSelection;

    /** Signals timeout in minutes @default 10 */
    readonly signalsTimeoutMinutes?: number;

    /** Target group to register instances with (enables ELB health checks) */
    readonly targetGroup?: elbv2.IApplicationTargetGroup;
}

/**
 * Auto Scaling Group that waits for cfn-signal from `minCapacity` instances.
 *
 * Instances must run `cfn-signal` against {@link AutoScalingGroupConstruct.logicalId}
 * (see UserDataBuilder.sendCfnSignal) or stack creation times out.
 *
 * @example
 * ```typescript
 * const asg = new AutoScalingGroupConstruct(this, 'WebAsg', {
 *     vpc,
 *     launchTemplate: lt.launchTemplate,
 *     namePrefix: 'three-tier-app-web',
 *     subnetSelection: { subnetType: ec2.SubnetType.PUBLIC },
 *     targetGroup,
 * });
 * ```
 */
export class AutoScalingGroupConstruct extends Construct {
    /** The Auto Scaling Group */
    public readonly autoScalingGroup: autoscaling.AutoScalingGroup;

    constructor(scope: Construct, id: string, props: AutoScalingGroupConstructProps) {
        super(scope, id);

        const minCapacity = props.minCapacity ?? 1;
        const maxCapacity = props.maxCapacity ?? 2;

        // =================================================================
        // INPUT VALIDATION
        // =================================================================
        if (minCapacity > maxCapacity) {
            throw new Error(
                `ASG capacity invalid: minCapacity (${minCapacity}) cannot exceed ` +
                `maxCapacity (${maxCapacity}).`,
            );
        }

        // CloudFormation waits PauseTime (not the CreationPolicy timeout) for
        // signals during rolling updates, so both use the same duration.
        const signalsTimeout = cdk.Duration.minutes(props.signalsTimeoutMinutes ?? 10);
        const gracePeriod = INSTANCE_SETTLE_TIME;

        // =================================================================
        // AUTO SCALING GROUP
        // =================================================================
        this.autoScalingGroup = new autoscaling.AutoScalingGroup(this, 'AutoScalingGroup', {
            autoScalingGroupName: `${props.namePrefix}-asg`,
            vpc: props.vpc,
            launchTemplate: props.launchTemplate,
            minCapacity,
            maxCapacity,
            vpcSubnets: props.subnetSelection ?? {
                subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
            },
            healthChecks: props.targetGroup
                ? autoscaling.HealthChecks.withAdditionalChecks({
                    additionalTypes: [autoscaling.AdditionalHealthCheckType.ELB],
                    gracePeriod,
                })
                : autoscaling.HealthChecks.ec2({ gracePeriod }),
            updatePolicy: autoscaling.UpdatePolicy.rollingUpdate({
                maxBatchSize: 1,
                minInstancesInService: minCapacity,
                pauseTime: signalsTimeout,
            }),
            signals: autoscaling.Signals.waitForMinCapacity({
                timeout: signalsTimeout,
            }),
        });

        if (props.targetGroup) {
            this.autoScalingGroup.attachToApplicationTargetGroup(props.targetGroup);
        }

        this.configureScalingPolicy(props.scalingPolicy);

        cdk.Tags.of(this.autoScalingGroup).add('Component', 'AutoScalingGroup');
    }

    /**
     * Logical ID of the underlying AWS::AutoScaling::AutoScalingGroup,
     * the `--resource` instances signal.
     */
    get logicalId(): string {
        const cfnGroup = this.autoScalingGroup.node.defaultChild;
        if (!(cfnGroup instanceof autoscaling.CfnAutoScalingGroup)) {
            throw new Error(`Auto Scaling Group ${this.node.path} has no CfnAutoScalingGroup`);
        }
        return cfnGroup.logicalId;
    }

    /** Auto Scaling Group name */
    get autoScalingGroupName(): string {
        return this.autoScalingGroup.autoScalingGroupName;
    }

    /**
     * Configures target tracking scaling policy based on CPU utilization
     */
    private configureScalingPolicy(config?: ScalingPolicyConfiguration): void {
        this.autoScalingGroup.scaleOnCpuUtilization('CpuScalingPolicy', {
            targetUtilizationPercent: config?.targetCpuUtilization ?? 70,
            cooldown: INSTANCE_SETTLE_TIME,
            estimatedInstanceWarmup: INSTANCE_SETTLE_TIME,
        });
    }
}
