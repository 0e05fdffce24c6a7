/**
 * @format
 * Stack Contract
 *
 * Named parameters and outputs exchanged between the tier stacks.
 * Producers export every output as `{AWS::StackName}-{OutputKey}`; consumers
 * receive the producer's stack name as a parameter and import by the same
 * pattern. The deployment CLI passes parameters from TIER_PARAMETERS.
 */

import { Tier } from '../utilities/naming';

// =============================================================================
// PARAMETERS
// =============================================================================

export const StackParameter = {
    NETWORK_STACK_NAME: 'NetworkStackName',
    DATABASE_STACK_NAME: 'DatabaseStackName',
    ALB_STACK_NAME: 'ALBStackName',
    KEY_PAIR_NAME: 'KeyPairName',
} as const;

export type StackParameterKey = (typeof StackParameter)[keyof typeof StackParameter];

/**
 * Producer tier whose stack name each stack-name parameter carries
 */
export const STACK_NAME_PARAMETER_TIER: Record<Exclude<StackParameterKey, 'KeyPairName'>, Tier> = {
    [StackParameter.NETWORK_STACK_NAME]: 'network',
    [StackParameter.DATABASE_STACK_NAME]: 'database',
    [StackParameter.ALB_STACK_NAME]: 'alb',
};

/**
 * Parameters each tier's template declares, in submission order
 */
export const TIER_PARAMETERS: Record<Tier, readonly StackParameterKey[]> = {
    network: [],
    database: [StackParameter.NETWORK_STACK_NAME],
    alb: [StackParameter.NETWORK_STACK_NAME],
    web: [
        StackParameter.NETWORK_STACK_NAME,
        StackParameter.ALB_STACK_NAME,
        StackParameter.KEY_PAIR_NAME,
    ],
    app: [
        StackParameter.NETWORK_STACK_NAME,
        StackParameter.ALB_STACK_NAME,
        StackParameter.DATABASE_STACK_NAME,
        StackParameter.KEY_PAIR_NAME,
    ],
};

// =============================================================================
// OUTPUTS
// =============================================================================

export const NetworkOutput = {
    VPC_ID: 'VPCID',
    VPC_CIDR: 'VPCCidr',
    PUBLIC_SUBNET_1: 'PublicSubnet1',
    PUBLIC_SUBNET_2: 'PublicSubnet2',
    APP_SUBNET_1: 'AppSubnet1',
    APP_SUBNET_2: 'AppSubnet2',
    DB_SUBNET_1: 'DBSubnet1',
    DB_SUBNET_2: 'DBSubnet2',
    WEB_ALB_SECURITY_GROUP: 'WebALBSecurityGroup',
    WEB_TIER_SECURITY_GROUP: 'WebTierSecurityGroup',
    APP_ALB_SECURITY_GROUP: 'AppALBSecurityGroup',
    APP_TIER_SECURITY_GROUP: 'AppTierSecurityGroup',
    DATABASE_SECURITY_GROUP: 'DatabaseSecurityGroup',
} as const;

export const DatabaseOutput = {
    ENDPOINT: 'DBEndpoint',
    PORT: 'DBPort',
    NAME: 'DBName',
    SECRET_ARN: 'DBSecretArn',
} as const;

export const LoadBalancerOutput = {
    DNS_NAME: 'ALBDNSName',
    WEB_TARGET_GROUP_ARN: 'WebTargetGroupArn',
    APP_DNS_NAME: 'AppALBDNSName',
    APP_TARGET_GROUP_ARN: 'AppTargetGroupArn',
} as const;

export const WebTierOutput = {
    AUTO_SCALING_GROUP_NAME: 'WebAutoScalingGroupName',
} as const;

export const AppTierOutput = {
    AUTO_SCALING_GROUP_NAME: 'AppAutoScalingGroupName',
} as const;

/**
 * Outputs each tier's template exports
 */
export const TIER_OUTPUTS: Record<Tier, readonly string[]> = {
    network: Object.values(NetworkOutput),
    database: Object.values(DatabaseOutput),
    alb: Object.values(LoadBalancerOutput),
    web: Object.values(WebTierOutput),
    app: Object.values(AppTierOutput),
};
