/**
 * @format
 * Naming Utilities — Single Source of Truth
 *
 * Centralised stack, export and resource naming conventions.
 * The CDK stacks and the deployment CLI both derive names from here.
 *
 * Stack name pattern:  {prefix}-{tier}            e.g. three-tier-app-network
 * Export name pattern: {stackName}-{OutputKey}    e.g. three-tier-app-network-VPCID
 */

// =============================================================================
// TIER REGISTRY
// =============================================================================

/**
 * Every tier, in creation order.
 * Teardown runs in the exact reverse of this order.
 */
export const TIERS = ['network', 'database', 'alb', 'web', 'app'] as const;

/** Type-safe tier keys */
export type Tier = (typeof TIERS)[number];

/**
 * Check if a value names a tier
 */
export function isTier(value: string): value is Tier {
    return (TIERS as readonly string[]).includes(value);
}

// =============================================================================
// STACK NAMING FUNCTIONS
// =============================================================================

/**
 * Generate a CloudFormation stack name.
 *
 * @example
 * stackName('three-tier-app', 'network') // 'three-tier-app-network'
 */
export function stackName(prefix: string, tier: Tier): string {
    return `${prefix}-${tier}`;
}

/**
 * Generate a CloudFormation export name.
 * Producers export `{AWS::StackName}-{OutputKey}`; consumers import the same
 * pattern with the producer's stack name parameter.
 *
 * @example
 * exportName('three-tier-app-network', 'VPCID') // 'three-tier-app-network-VPCID'
 */
export function exportName(producerStackName: string, outputKey: string): string {
    return `${producerStackName}-${outputKey}`;
}

/**
 * Generate a physical resource name.
 *
 * @example
 * resourceName('three-tier-app', 'web-alb') // 'three-tier-app-web-alb'
 */
export function resourceName(prefix: string, component: string): string {
    return `${prefix}-${component}`;
}

/**
 * Describe a CIDR block in human-readable format
 */
export function describeCidr(cidr: string): string {
    if (cidr.endsWith('/32')) {
        return `IP ${cidr.replace('/32', '')}`;
    }
    if (cidr.endsWith('/0')) {
        return 'All IPs (0.0.0.0/0)';
    }
    return `CIDR ${cidr}`;
}
