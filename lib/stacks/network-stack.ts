/**
 * @format
 * Network Stack
 *
 * VPC, subnets and every tier security group.
 * Stack name: {prefix}-network (e.g., three-tier-app-network)
 *
 * Subnet layout (two AZs, one subnet of each kind per AZ):
 * - Public    — web ALB, web tier instances, NAT gateways
 * - App       — internal ALB, app tier instances (egress via NAT)
 * - Database  — RDS (isolated, no route to the internet)
 *
 * Security group chain:
 *   internet → web ALB → web tier → app ALB → app tier → database
 * Every group lives here so that consumer stacks only import IDs and the
 * stacks never reference each other in a cycle.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { exportOutput } from '../common/cross-stack/stack-references';
import { TierSecurityGroupConstruct } from '../common/security/security-group';
import { NetworkConfig } from '../config/configurations';
import { Environment } from '../config/environments';
import { describeCidr, resourceName } from '../utilities/naming';
import { validateCidr } from '../utilities/validation';

import { NetworkOutput } from './contract';

/** Ports used along the request chain */
export const HTTP_PORT = 80;
export const SSH_PORT = 22;
export const MYSQL_PORT = 3306;

/**
 * Props for NetworkStack
 */
export interface NetworkStackProps extends cdk.StackProps {
    /** Target environment (renamed to avoid CDK Stack.environment conflict) */
    readonly targetEnvironment: Environment;
    /** Prefix for resource names */
    readonly stackPrefix: string;
    /** Network sizing */
    readonly config: NetworkConfig;
    /** CIDR allowed to SSH into the web tier; no SSH ingress when unset */
    readonly sshIngressCidr?: string;
}

/**
 * Network tier: VPC plus the security group chain.
 *
 * @example
 * ```typescript
 * const network = new NetworkStack(app, 'three-tier-app-network', {
 *     targetEnvironment: Environment.DEVELOPMENT,
 *     stackPrefix: 'three-tier-app',
 *     config: getThreeTierConfigs(Environment.DEVELOPMENT).network,
 * });
 * ```
 */
export class NetworkStack extends cdk.Stack {
    /** The VPC created by this stack */
    public readonly vpc: ec2.Vpc;
    /** The target environment */
    public readonly targetEnvironment: Environment;
    /** Internet-facing ALB security group */
    public readonly webAlbSecurityGroup: TierSecurityGroupConstruct;
    /** Web tier instance security group */
    public readonly webTierSecurityGroup: TierSecurityGroupConstruct;
    /** Internal ALB security group */
    public readonly appAlbSecurityGroup: TierSecurityGroupConstruct;
    /** App tier instance security group */
    public readonly appTierSecurityGroup: TierSecurityGroupConstruct;
    /** Database security group */
    public readonly databaseSecurityGroup: TierSecurityGroupConstruct;

    constructor(scope: Construct, id: string, props: NetworkStackProps) {
        super(scope, id, props);

        this.targetEnvironment = props.targetEnvironment;
        const { config, stackPrefix } = props;

        if (props.sshIngressCidr !== undefined) {
            const result = validateCidr(props.sshIngressCidr);
            if (!result.valid) {
                throw new Error(`Invalid SSH ingress CIDR: ${result.error}`);
            }
        }

        // =====================================================================
        // VPC
        // =====================================================================
        this.vpc = new ec2.Vpc(this, 'Vpc', {
            vpcName: resourceName(stackPrefix, 'vpc'),
            ipAddresses: ec2.IpAddresses.cidr(config.vpcCidr),
            maxAzs: config.maxAzs,
            natGateways: config.natGateways,
            // The restriction is a custom resource backed by a Lambda asset,
            // which bootstrapless templates cannot carry.
            restrictDefaultSecurityGroup: false,
            subnetConfiguration: [
                {
                    name: 'Public',
                    subnetType: ec2.SubnetType.PUBLIC,
                    cidrMask: config.subnetCidrMask,
                },
                {
                    name: 'App',
                    subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
                    cidrMask: config.subnetCidrMask,
                },
                {
                    name: 'Database',
                    subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
                    cidrMask: config.subnetCidrMask,
                },
            ],
        });

        if (config.flowLogs) {
            this.configureFlowLogs(stackPrefix, config.flowLogRetention);
        }

        // =====================================================================
        // SECURITY GROUP CHAIN
        // =====================================================================
        this.webAlbSecurityGroup = new TierSecurityGroupConstruct(this, 'WebAlbSecurityGroup', {
            vpc: this.vpc,
            name: resourceName(stackPrefix, 'web-alb-sg'),
            description: 'Internet-facing ALB: HTTP from anywhere',
        });
        this.webAlbSecurityGroup.addIngressFromCidr(
            '0.0.0.0/0',
            HTTP_PORT,
            'HTTP from the internet',
        );

        this.webTierSecurityGroup = new TierSecurityGroupConstruct(this, 'WebTierSecurityGroup', {
            vpc: this.vpc,
            name: resourceName(stackPrefix, 'web-tier-sg'),
            description: 'Web tier instances: HTTP from the web ALB',
        });
        this.webTierSecurityGroup.addIngressFromTier(
            this.webAlbSecurityGroup,
            HTTP_PORT,
            'HTTP from the web ALB',
        );
        if (props.sshIngressCidr !== undefined) {
            this.webTierSecurityGroup.addIngressFromCidr(
                props.sshIngressCidr,
                SSH_PORT,
                `SSH from ${describeCidr(props.sshIngressCidr)}`,
            );
        }

        this.appAlbSecurityGroup = new TierSecurityGroupConstruct(this, 'AppAlbSecurityGroup', {
            vpc: this.vpc,
            name: resourceName(stackPrefix, 'app-alb-sg'),
            description: 'Internal ALB: HTTP from the web tier',
        });
        this.appAlbSecurityGroup.addIngressFromTier(
            this.webTierSecurityGroup,
            HTTP_PORT,
            'HTTP from the web tier',
        );

        this.appTierSecurityGroup = new TierSecurityGroupConstruct(this, 'AppTierSecurityGroup', {
            vpc: this.vpc,
            name: resourceName(stackPrefix, 'app-tier-sg'),
            description: 'App tier instances: HTTP from the internal ALB',
        });
        this.appTierSecurityGroup.addIngressFromTier(
            this.appAlbSecurityGroup,
            HTTP_PORT,
            'HTTP from the internal ALB',
        );
        this.appTierSecurityGroup.addIngressFromTier(
            this.webTierSecurityGroup,
            SSH_PORT,
            'SSH from the web tier (bastion hop)',
        );

        this.databaseSecurityGroup = new TierSecurityGroupConstruct(this, 'DatabaseSecurityGroup', {
            vpc: this.vpc,
            name: resourceName(stackPrefix, 'db-sg'),
            description: 'Database: MySQL from the app tier',
        });
        this.databaseSecurityGroup.addIngressFromTier(
            this.appTierSecurityGroup,
            MYSQL_PORT,
            'MySQL from the app tier',
        );

        // =====================================================================
        // OUTPUTS
        // =====================================================================
        const [publicSubnet1, publicSubnet2] = this.subnetIds(this.vpc.publicSubnets, 'public');
        const [appSubnet1, appSubnet2] = this.subnetIds(this.vpc.privateSubnets, 'app');
        const [dbSubnet1, dbSubnet2] = this.subnetIds(this.vpc.isolatedSubnets, 'database');

        exportOutput(this, NetworkOutput.VPC_ID, this.vpc.vpcId, 'VPC ID');
        exportOutput(this, NetworkOutput.VPC_CIDR, this.vpc.vpcCidrBlock, 'VPC CIDR block');
        exportOutput(this, NetworkOutput.PUBLIC_SUBNET_1, publicSubnet1, 'Public subnet (AZ 1)');
        exportOutput(this, NetworkOutput.PUBLIC_SUBNET_2, publicSubnet2, 'Public subnet (AZ 2)');
        exportOutput(this, NetworkOutput.APP_SUBNET_1, appSubnet1, 'Application subnet (AZ 1)');
        exportOutput(this, NetworkOutput.APP_SUBNET_2, appSubnet2, 'Application subnet (AZ 2)');
        exportOutput(this, NetworkOutput.DB_SUBNET_1, dbSubnet1, 'Database subnet (AZ 1)');
        exportOutput(this, NetworkOutput.DB_SUBNET_2, dbSubnet2, 'Database subnet (AZ 2)');
        exportOutput(
            this,
            NetworkOutput.WEB_ALB_SECURITY_GROUP,
            this.webAlbSecurityGroup.securityGroupId,
            'Internet-facing ALB security group',
        );
        exportOutput(
            this,
            NetworkOutput.WEB_TIER_SECURITY_GROUP,
            this.webTierSecurityGroup.securityGroupId,
            'Web tier security group',
        );
        exportOutput(
            this,
            NetworkOutput.APP_ALB_SECURITY_GROUP,
            this.appAlbSecurityGroup.securityGroupId,
            'Internal ALB security group',
        );
        exportOutput(
            this,
            NetworkOutput.APP_TIER_SECURITY_GROUP,
            this.appTierSecurityGroup.securityGroupId,
            'App tier security group',
        );
        exportOutput(
            this,
            NetworkOutput.DATABASE_SECURITY_GROUP,
            this.databaseSecurityGroup.securityGroupId,
            'Database security group',
        );
    }

    private subnetIds(subnets: ec2.ISubnet[], kind: string): [string, string] {
        const [first, second] = subnets;
        if (first === undefined || second === undefined) {
            throw new Error(`Expected 2 ${kind} subnets, found ${subnets.length}`);
        }
        return [first.subnetId, second.subnetId];
    }

    private configureFlowLogs(stackPrefix: string, retention: logs.RetentionDays): void {
        const logGroup = new logs.LogGroup(this, 'FlowLogGroup', {
            logGroupName: `/vpc/${stackPrefix}/flow-logs`,
            retention,
            removalPolicy: cdk.RemovalPolicy.DESTROY,
        });

        this.vpc.addFlowLog('FlowLog', {
            trafficType: ec2.FlowLogTrafficType.ALL,
            destination: ec2.FlowLogDestination.toCloudWatchLogs(logGroup),
        });
    }
}
