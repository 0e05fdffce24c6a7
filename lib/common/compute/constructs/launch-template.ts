/**
 * @format
 * Launch Template Construct
 *
 * Launch template for web and app tier instances. ONLY accepts a security
 * group from the stack (both tiers import theirs from the network stack).
 *
 * Features:
 * - IMDSv2 required
 * - Encrypted GP3 root volume
 * - Instance role with SSM and CloudWatch agent permissions
 * - CloudWatch log group for instance logs
 * - Latest Amazon Linux 2023 AMI (or custom)
 *
 * Blueprint Pattern Flow:
 * 1. Stack imports the tier security group → securityGroup
 * 2. Stack creates LaunchTemplateConstruct (with securityGroup) → launchTemplate
 * 3. Stack creates AutoScalingGroupConstruct (with launchTemplate) → autoScalingGroup
 *
 * Tag strategy:
 * Only `Component: LaunchTemplate` is applied here. Organizational tags
 * come from TaggingAspect at app level.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { assertValid, validateGp3Volume } from '../../../utilities/validation';

/**
 * Props for LaunchTemplateConstruct
 */
export interface LaunchTemplateConstructProps {
    /** Security group for the instances */
    readonly securityGroup: ec2.ISecurityGroup;

    /** Instance type @default t3.micro */
    readonly instanceType?: ec2.InstanceType;

    /** EBS root volume size in GB @default 8 */
    readonly volumeSizeGb?: number;

    /** EBS volume IOPS @default 3000 */
    readonly volumeIops?: number;

    /** EBS volume throughput in MiB/s @default 125 */
    readonly volumeThroughput?: number;

    /**
     * SSH key pair name. May be a token (the KeyPairName stack parameter).
     * @default undefined (no key pair)
     */
    readonly keyPairName?: string;

    /** Enable detailed CloudWatch monitoring @default false */
    readonly detailedMonitoring?: boolean;

    /** User data to run on instance launch */
    readonly userData?: ec2.UserData;

    /** Custom machine image @default Amazon Linux 2023 */
    readonly machineImage?: ec2.IMachineImage;

    /**
     * Name prefix for resources, e.g. 'three-tier-app-web'.
     * Used in the launch template name, role description and log group name.
     */
    readonly namePrefix: string;

    /** Log retention period @default ONE_MONTH */
    readonly logRetention?: logs.RetentionDays;

    /** Log group removal policy @default DESTROY */
    readonly logRemovalPolicy?: cdk.RemovalPolicy;
}

/**
 * Launch template with a dedicated instance role and log group.
 *
 * @example
 * ```typescript
 * const lt = new LaunchTemplateConstruct(this, 'LaunchTemplate', {
 *     securityGroup: webTierSg,
 *     namePrefix: 'three-tier-app-web',
 *     keyPairName: keyPair.valueAsString,
 *     userData,
 * });
 * lt.addToRolePolicy(new iam.PolicyStatement({
 *     actions: ['secretsmanager:GetSecretValue'],
 *     resources: [secretArn],
 * }));
 * ```
 */
export class LaunchTemplateConstruct extends Construct {
    /** The Launch Template */
    public readonly launchTemplate: ec2.LaunchTemplate;

    /** IAM role attached to instances */
    public readonly instanceRole: iam.Role;

    /** CloudWatch log group for instance logs */
    public readonly logGroup: logs.LogGroup;

    constructor(scope: Construct, id: string, props: LaunchTemplateConstructProps) {
        super(scope, id);

        const volumeIops = props.volumeIops ?? 3000;
        const volumeThroughput = props.volumeThroughput ?? 125;
        assertValid(validateGp3Volume(volumeIops, volumeThroughput));

        // =================================================================
        // CLOUDWATCH LOG GROUP
        // =================================================================
        this.logGroup = new logs.LogGroup(this, 'LogGroup', {
            logGroupName: `/ec2/${props.namePrefix}/instances`,
            retention: props.logRetention ?? logs.RetentionDays.ONE_MONTH,
            removalPolicy: props.logRemovalPolicy ?? cdk.RemovalPolicy.DESTROY,
        });

        // =================================================================
        // IAM ROLE
        // =================================================================
        this.instanceRole = new iam.Role(this, 'InstanceRole', {
            assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
            description: `IAM role for ${props.namePrefix} EC2 instances`,
            managedPolicies: [
                iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
                iam.ManagedPolicy.fromAwsManagedPolicyName('CloudWatchAgentServerPolicy'),
            ],
        });
        this.logGroup.grantWrite(this.instanceRole);

        // =================================================================
        // LAUNCH TEMPLATE
        // =================================================================
        this.launchTemplate = new ec2.LaunchTemplate(this, 'LaunchTemplate', {
            launchTemplateName: `${props.namePrefix}-lt`,
            instanceType: props.instanceType ?? ec2.InstanceType.of(
                ec2.InstanceClass.T3,
                ec2.InstanceSize.MICRO,
            ),
            machineImage: props.machineImage ?? ec2.MachineImage.latestAmazonLinux2023(),
            securityGroup: props.securityGroup,
            role: this.instanceRole,
            keyPair: props.keyPairName
                ? ec2.KeyPair.fromKeyPairName(this, 'KeyPair', props.keyPairName)
                : undefined,
            blockDevices: [
                {
                    deviceName: '/dev/xvda',
                    volume: ec2.BlockDeviceVolume.ebs(props.volumeSizeGb ?? 8, {
                        volumeType: ec2.EbsDeviceVolumeType.GP3,
                        encrypted: true,
                        deleteOnTermination: true,
                        iops: volumeIops,
                        throughput: volumeThroughput,
                    }),
                },
            ],
            detailedMonitoring: props.detailedMonitoring ?? false,
            requireImdsv2: true,
            userData: props.userData,
        });

        cdk.Tags.of(this.launchTemplate).add('Component', 'LaunchTemplate');
    }

    // =========================================================================
    // GRANT HELPERS
    // =========================================================================

    /**
     * Add an IAM policy statement to the instance role.
     */
    addToRolePolicy(statement: iam.PolicyStatement): void {
        this.instanceRole.addToPrincipalPolicy(statement);
    }
}
