/**
 * @format
 * App Tier Stack
 *
 * Backend instances in the application subnets behind the internal ALB.
 * Instances answer `/` and `/health`, and receive the database connection
 * settings (endpoint, port, name, credentials secret ARN) in an environment
 * file. The instance role may read the database secret.
 * Stack name: {prefix}-app
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as iam from 'aws-cdk-lib/aws-iam';
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

import { APP_HEALTH_CHECK_PATH } from './alb-stack';
import {
    AppTierOutput,
    DatabaseOutput,
    LoadBalancerOutput,
    NetworkOutput,
    StackParameter,
} from './contract';
import { keyPairParameter } from './key-pair-parameter';

/**
 * Props for AppTierStack
 */
export interface AppTierStackProps extends cdk.StackProps {
    /** Target environment */
    readonly targetEnvironment: Environment;
    /** Prefix for resource names */
    readonly stackPrefix: string;
    /** Default for the NetworkStackName parameter */
    readonly networkStackName: string;
    /** Default for the ALBStackName parameter */
    readonly albStackName: string;
    /** Default for the DatabaseStackName parameter */
    readonly databaseStackName: string;
    /** Default for the KeyPairName parameter */
    readonly keyPairName: string;
    /** Instance sizing and scaling */
    readonly config: TierComputeConfig;
}

export class AppTierStack extends cdk.Stack {
    /** The app tier Auto Scaling Group */
    public readonly autoScalingGroup: AutoScalingGroupConstruct;

    constructor(scope: Construct, id: string, props: AppTierStackProps) {
        super(scope, id, props);

        const { config } = props;
        const namePrefix = resourceName(props.stackPrefix, 'app');

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
        const database = new StackNameParameter(this, StackParameter.DATABASE_STACK_NAME, {
            defaultStackName: props.databaseStackName,
            description: 'Name of the database stack whose exports this stack imports',
        });
        const keyPair = keyPairParameter(this, props.keyPairName);

        const vpc = importVpc(this, 'Vpc', network);
        const securityGroup = importSecurityGroup(
            this,
            'AppTierSecurityGroup',
            network,
            NetworkOutput.APP_TIER_SECURITY_GROUP,
        );
        const targetGroup = elbv2.ApplicationTargetGroup.fromTargetGroupAttributes(
            this,
            'AppTargetGroup',
            { targetGroupArn: loadBalancers.importValue(LoadBalancerOutput.APP_TARGET_GROUP_ARN) },
        );
        const databaseSecretArn = database.importValue(DatabaseOutput.SECRET_ARN);

        // =====================================================================
        // COMPUTE
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

        launchTemplate.addToRolePolicy(new iam.PolicyStatement({
            sid: 'ReadDatabaseSecret',
            effect: iam.Effect.ALLOW,
            actions: ['secretsmanager:GetSecretValue', 'secretsmanager:DescribeSecret'],
            resources: [databaseSecretArn],
        }));

        this.autoScalingGroup = new AutoScalingGroupConstruct(this, 'AutoScalingGroup', {
            vpc,
            launchTemplate: launchTemplate.launchTemplate,
            minCapacity: config.minCapacity,
            maxCapacity: config.maxCapacity,
            scalingPolicy: { targetCpuUtilization: config.targetCpuUtilization },
            namePrefix,
            subnetSelection: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
            signalsTimeoutMinutes: config.signalsTimeoutMinutes,
            targetGroup,
        });

        new UserDataBuilder(userData)
            .updateSystem()
            .writeEnvironmentFile({
                DB_HOST: database.importValue(DatabaseOutput.ENDPOINT),
                DB_PORT: database.importValue(DatabaseOutput.PORT),
                DB_NAME: database.importValue(DatabaseOutput.NAME),
                DB_SECRET_ARN: databaseSecretArn,
                AWS_REGION: this.region,
            })
            .installNginx()
            .configureBackend({ healthPath: APP_HEALTH_CHECK_PATH })
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
            AppTierOutput.AUTO_SCALING_GROUP_NAME,
            this.autoScalingGroup.autoScalingGroupName,
            'App tier Auto Scaling Group name',
        );
    }
}
