/**
 * @format
 * Database Stack
 *
 * RDS MySQL instance in the isolated database subnets.
 * Stack name: {prefix}-database
 *
 * Master credentials are generated into Secrets Manager; the app tier reads
 * them through the DBSecretArn export. Production runs multi-AZ and takes a
 * final snapshot on delete.
 */

import { NagSuppressions } from 'cdk-nag';

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import {
    exportOutput,
    importSecurityGroup,
    importVpc,
    StackNameParameter,
} from '../common/cross-stack/stack-references';
import { DatabaseConfig } from '../config/configurations';
import { Environment, isProductionEnvironment } from '../config/environments';

import { DatabaseOutput, NetworkOutput, StackParameter } from './contract';

/**
 * Props for DatabaseStack
 */
export interface DatabaseStackProps extends cdk.StackProps {
    /** Target environment */
    readonly targetEnvironment: Environment;
    /** Default for the NetworkStackName parameter */
    readonly networkStackName: string;
    /** Database sizing */
    readonly config: DatabaseConfig;
}

export class DatabaseStack extends cdk.Stack {
    /** The RDS instance */
    public readonly instance: rds.DatabaseInstance;
    /** Generated master credentials */
    public readonly secret: rds.DatabaseSecret;

    constructor(scope: Construct, id: string, props: DatabaseStackProps) {
        super(scope, id, props);

        const { config } = props;
        const isProduction = isProductionEnvironment(props.targetEnvironment);

        // =====================================================================
        // IMPORTS
        // =====================================================================
        const network = new StackNameParameter(this, StackParameter.NETWORK_STACK_NAME, {
            defaultStackName: props.networkStackName,
            description: 'Name of the network stack whose exports this stack imports',
        });
        const vpc = importVpc(this, 'Vpc', network);
        const securityGroup = importSecurityGroup(
            this,
            'DatabaseSecurityGroup',
            network,
            NetworkOutput.DATABASE_SECURITY_GROUP,
        );

        // =====================================================================
        // CREDENTIALS
        // =====================================================================
        this.secret = new rds.DatabaseSecret(this, 'MasterSecret', {
            username: config.masterUsername,
        });

        // =====================================================================
        // DATABASE INSTANCE
        // =====================================================================
        this.instance = new rds.DatabaseInstance(this, 'Database', {
            engine: rds.DatabaseInstanceEngine.mysql({
                version: rds.MysqlEngineVersion.VER_8_0,
            }),
            instanceType: config.instanceType,
            vpc,
            vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_ISOLATED },
            securityGroups: [securityGroup],
            credentials: rds.Credentials.fromSecret(this.secret),
            databaseName: config.databaseName,
            allocatedStorage: config.allocatedStorageGb,
            maxAllocatedStorage: config.maxAllocatedStorageGb,
            storageType: rds.StorageType.GP3,
            storageEncrypted: true,
            multiAz: config.multiAz,
            publiclyAccessible: false,
            backupRetention: cdk.Duration.days(config.backupRetentionDays),
            deletionProtection: false,
            removalPolicy: isProduction
                ? cdk.RemovalPolicy.SNAPSHOT
                : cdk.RemovalPolicy.DESTROY,
            deleteAutomatedBackups: !isProduction,
        });

        // =====================================================================
        // CDK NAG SUPPRESSIONS
        // =====================================================================
        NagSuppressions.addResourceSuppressions(
            this.secret,
            [{ id: 'AwsSolutions-SMG4', reason: 'Demo credentials are not rotated' }],
            true,
        );
        NagSuppressions.addResourceSuppressions(
            this.instance,
            [
                { id: 'AwsSolutions-RDS11', reason: 'Default MySQL port is used inside the isolated subnets' },
                { id: 'AwsSolutions-RDS6', reason: 'Password authentication from the app tier' },
                ...(isProduction ? [] : [
                    { id: 'AwsSolutions-RDS3', reason: 'Single-AZ outside production' },
                    { id: 'AwsSolutions-RDS10', reason: 'Teardown is gated by the destroy confirmation; production keeps a final snapshot' },
                ]),
            ],
            true,
        );

        // =====================================================================
        // OUTPUTS
        // =====================================================================
        exportOutput(
            this,
            DatabaseOutput.ENDPOINT,
            this.instance.dbInstanceEndpointAddress,
            'Database endpoint address',
        );
        exportOutput(
            this,
            DatabaseOutput.PORT,
            this.instance.dbInstanceEndpointPort,
            'Database port',
        );
        exportOutput(this, DatabaseOutput.NAME, config.databaseName, 'Initial database name');
        exportOutput(
            this,
            DatabaseOutput.SECRET_ARN,
            this.secret.secretArn,
            'Secrets Manager ARN of the master credentials',
        );
    }
}
