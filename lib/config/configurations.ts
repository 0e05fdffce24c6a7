/**
 * @format
 * Three-Tier Resource Configurations
 *
 * Per-environment sizing and protection settings for each tier.
 * Configurations are "how it behaves" - capacity, instance sizes, retention.
 *
 * Usage:
 * ```typescript
 * const configs = getThreeTierConfigs(Environment.PRODUCTION);
 * configs.database.multiAz; // true
 * ```
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';

import { Environment } from './environments';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * Network tier configuration
 */
export interface NetworkConfig {
    /** VPC CIDR block */
    readonly vpcCidr: string;
    /** Availability zones to span (subnet outputs assume exactly 2) */
    readonly maxAzs: 2;
    /** NAT gateways for the application subnets */
    readonly natGateways: number;
    /** Subnet mask for every subnet */
    readonly subnetCidrMask: number;
    /** Publish VPC flow logs to CloudWatch */
    readonly flowLogs: boolean;
    /** Flow log retention (when enabled) */
    readonly flowLogRetention: logs.RetentionDays;
}

/**
 * Database tier configuration
 */
export interface DatabaseConfig {
    readonly instanceType: ec2.InstanceType;
    readonly databaseName: string;
    readonly masterUsername: string;
    readonly allocatedStorageGb: number;
    /** Storage autoscaling ceiling */
    readonly maxAllocatedStorageGb: number;
    readonly multiAz: boolean;
    readonly backupRetentionDays: number;
}

/**
 * Compute configuration shared by the web and app tiers
 */
export interface TierComputeConfig {
    readonly instanceType: ec2.InstanceType;
    readonly minCapacity: number;
    readonly maxCapacity: number;
    readonly targetCpuUtilization: number;
    readonly volumeSizeGb: number;
    readonly detailedMonitoring: boolean;
    /** Minutes to wait for cfn-signal from new instances */
    readonly signalsTimeoutMinutes: number;
}

/**
 * Complete resource configuration for all tiers
 */
export interface ThreeTierConfigs {
    readonly network: NetworkConfig;
    readonly database: DatabaseConfig;
    readonly web: TierComputeConfig;
    readonly app: TierComputeConfig;
}

// =============================================================================
// CONFIGURATIONS BY ENVIRONMENT
// =============================================================================

const T3_MICRO = ec2.InstanceType.of(ec2.InstanceClass.T3, ec2.InstanceSize.MICRO);
const T3_SMALL = ec2.InstanceType.of(ec2.InstanceClass.T3, ec2.InstanceSize.SMALL);

export const THREE_TIER_CONFIGS: Record<Environment, ThreeTierConfigs> = {
    [Environment.DEVELOPMENT]: {
        network: {
            vpcCidr: '10.0.0.0/16',
            maxAzs: 2,
            natGateways: 1,
            subnetCidrMask: 24,
            flowLogs: false,
            flowLogRetention: logs.RetentionDays.ONE_WEEK,
        },
        database: {
            instanceType: T3_MICRO,
            databaseName: 'appdb',
            masterUsername: 'admin',
            allocatedStorageGb: 20,
            maxAllocatedStorageGb: 50,
            multiAz: false,
            backupRetentionDays: 1,
        },
        web: {
            instanceType: T3_MICRO,
            minCapacity: 1,
            maxCapacity: 2,
            targetCpuUtilization: 70,
            volumeSizeGb: 8,
            detailedMonitoring: false,
            signalsTimeoutMinutes: 10,
        },
        app: {
            instanceType: T3_MICRO,
            minCapacity: 1,
            maxCapacity: 2,
            targetCpuUtilization: 70,
            volumeSizeGb: 8,
            detailedMonitoring: false,
            signalsTimeoutMinutes: 10,
        },
    },

    [Environment.STAGING]: {
        network: {
            vpcCidr: '10.1.0.0/16',
            maxAzs: 2,
            natGateways: 1,
            subnetCidrMask: 24,
            flowLogs: false,
            flowLogRetention: logs.RetentionDays.ONE_WEEK,
        },
        database: {
            instanceType: T3_SMALL,
            databaseName: 'appdb',
            masterUsername: 'admin',
            allocatedStorageGb: 20,
            maxAllocatedStorageGb: 100,
            multiAz: false,
            backupRetentionDays: 7,
        },
        web: {
            instanceType: T3_MICRO,
            minCapacity: 2,
            maxCapacity: 4,
            targetCpuUtilization: 70,
            volumeSizeGb: 8,
            detailedMonitoring: false,
            signalsTimeoutMinutes: 10,
        },
        app: {
            instanceType: T3_SMALL,
            minCapacity: 2,
            maxCapacity: 4,
            targetCpuUtilization: 70,
            volumeSizeGb: 8,
            detailedMonitoring: false,
            signalsTimeoutMinutes: 10,
        },
    },

    [Environment.PRODUCTION]: {
        network: {
            vpcCidr: '10.2.0.0/16',
            maxAzs: 2,
            natGateways: 2,
            subnetCidrMask: 24,
            flowLogs: true,
            flowLogRetention: logs.RetentionDays.THREE_MONTHS,
        },
        database: {
            instanceType: T3_SMALL,
            databaseName: 'appdb',
            masterUsername: 'admin',
            allocatedStorageGb: 50,
            maxAllocatedStorageGb: 200,
            multiAz: true,
            backupRetentionDays: 14,
        },
        web: {
            instanceType: T3_SMALL,
            minCapacity: 2,
            maxCapacity: 6,
            targetCpuUtilization: 60,
            volumeSizeGb: 16,
            detailedMonitoring: true,
            signalsTimeoutMinutes: 15,
        },
        app: {
            instanceType: T3_SMALL,
            minCapacity: 2,
            maxCapacity: 6,
            targetCpuUtilization: 60,
            volumeSizeGb: 16,
            detailedMonitoring: true,
            signalsTimeoutMinutes: 15,
        },
    },
};

/**
 * Get resource configurations for an environment
 */
export function getThreeTierConfigs(env: Environment): ThreeTierConfigs {
    return THREE_TIER_CONFIGS[env];
}
