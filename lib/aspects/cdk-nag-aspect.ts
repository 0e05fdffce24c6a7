/**
 * @format
 * CDK-Nag Compliance Aspect
 *
 * Opt-in cdk-nag validation of the tier stacks (`-c nagChecks=true`).
 * Resource-level suppressions live next to the resources; the stack-level
 * exceptions shared by every tier are listed here.
 */

import {
    AwsSolutionsChecks,
    NIST80053R5Checks,
    NagSuppressions,
    NagPackSuppression,
} from 'cdk-nag';

import { Aspects, Stack } from 'aws-cdk-lib/core';

import { IConstruct } from 'constructs';

/**
 * Available compliance packs
 */
export enum CompliancePack {
    /** AWS Solutions - General best practices */
    AWS_SOLUTIONS = 'AwsSolutions',
    /** NIST 800-53 Rev 5 - Federal security */
    NIST_800_53 = 'NIST800-53',
}

/**
 * CDK-Nag configuration options
 */
export interface CdkNagConfig {
    /** Which compliance packs to enable */
    readonly packs?: CompliancePack[];
    /** Whether to include verbose logging */
    readonly verbose?: boolean;
    /** Whether to generate compliance reports */
    readonly reports?: boolean;
}

const DEFAULT_CONFIG: Required<CdkNagConfig> = {
    packs: [CompliancePack.AWS_SOLUTIONS],
    verbose: false,
    reports: true,
};

/**
 * Apply cdk-nag compliance checks to a scope.
 *
 * @example
 * ```typescript
 * applyCdkNag(app, { packs: [CompliancePack.AWS_SOLUTIONS], reports: false });
 * ```
 */
export function applyCdkNag(scope: IConstruct, config: CdkNagConfig = {}): void {
    const { packs, verbose, reports } = { ...DEFAULT_CONFIG, ...config };

    for (const pack of packs) {
        switch (pack) {
            case CompliancePack.AWS_SOLUTIONS:
                Aspects.of(scope).add(new AwsSolutionsChecks({ verbose, reports }));
                break;
            case CompliancePack.NIST_800_53:
                Aspects.of(scope).add(new NIST80053R5Checks({ verbose, reports }));
                break;
        }
    }
}

/**
 * Documented exceptions shared by all three-tier stacks.
 */
export const COMMON_SUPPRESSIONS: NagPackSuppression[] = [
    {
        id: 'AwsSolutions-EC23',
        reason: 'The internet-facing ALB accepts HTTP from 0.0.0.0/0; every other group admits only its upstream tier',
    },
    {
        id: 'AwsSolutions-EC28',
        reason: 'Detailed monitoring is enabled in production only',
    },
    {
        id: 'AwsSolutions-EC29',
        reason: 'Instances belong to Auto Scaling Groups and are replaced, not protected',
    },
    {
        id: 'AwsSolutions-IAM4',
        reason: 'AWS managed policies used for SSM and CloudWatch agent on tier instances',
    },
    {
        id: 'AwsSolutions-IAM5',
        reason: 'CloudWatch Logs stream ARNs require a wildcard suffix',
    },
    {
        id: 'AwsSolutions-VPC7',
        reason: 'VPC flow logs are enabled in production only',
    },
    {
        id: 'AwsSolutions-AS3',
        reason: 'Scaling events are not sent to an SNS topic',
    },
    {
        id: 'AwsSolutions-ELB2',
        reason: 'ALB access logs are not collected',
    },
];

/**
 * Apply common suppressions to a stack.
 */
export function applyCommonSuppressions(stack: Stack): void {
    NagSuppressions.addStackSuppressions(stack, COMMON_SUPPRESSIONS);
}
