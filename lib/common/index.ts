/**
 * @format
 * Common Constructs - Central Export
 *
 * Reusable CDK constructs organized by resource type.
 */

// Compute constructs (launch template, ASG, user data)
export * from './compute';

// Cross-stack parameter/export helpers
export * from './cross-stack/stack-references';

// Networking constructs (ALB)
export * from './networking';

// Security constructs (tier security groups)
export * from './security/security-group';
