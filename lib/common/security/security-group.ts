/**
 * @format
 * Tier Security Group Construct
 *
 * Security group for one hop of the request chain
 * (internet → web ALB → web tier → app ALB → app tier → database).
 *
 * Every group is created without ingress; each tier's allowed sources are
 * added explicitly with the helpers below. All groups live in the network
 * stack so the chain can reference its members without cross-stack cycles.
 *
 * Tag strategy:
 * Only Name/Component tags are applied here. Organizational tags
 * (Project, Environment, Owner, ManagedBy) come from TaggingAspect at app level.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

/**
 * Props for TierSecurityGroupConstruct
 */
export interface TierSecurityGroupConstructProps {
    /** VPC for the security group */
    readonly vpc: ec2.IVpc;
    /** Description for the security group */
    readonly description: string;
    /** Value of the Name tag, e.g. 'three-tier-app-web-alb-sg' */
    readonly name: string;
    /** Allow all outbound traffic @default true */
    readonly allowAllOutbound?: boolean;
}

/**
 * Security group with no default ingress.
 *
 * @example
 * ```typescript
 * const webAlb = new TierSecurityGroupConstruct(this, 'WebAlbSecurityGroup', {
 *     vpc,
 *     name: 'three-tier-app-web-alb-sg',
 *     description: 'Internet-facing ALB',
 * });
 * webAlb.addIngressFromCidr('0.0.0.0/0', 80, 'HTTP from the internet');
 * ```
 */
export class TierSecurityGroupConstruct extends Construct {
    /** The security group */
    public readonly securityGroup: ec2.SecurityGroup;

    constructor(scope: Construct, id: string, props: TierSecurityGroupConstructProps) {
        super(scope, id);

        this.securityGroup = new ec2.SecurityGroup(this, 'SecurityGroup', {
            vpc: props.vpc,
            description: props.description,
            allowAllOutbound: props.allowAllOutbound ?? true,
        });

        cdk.Tags.of(this.securityGroup).add('Name', props.name);
        cdk.Tags.of(this.securityGroup).add('Component', 'security-group');
    }

    /** Security group ID */
    get securityGroupId(): string {
        return this.securityGroup.securityGroupId;
    }

    /**
     * Add ingress rule for a specific port from CIDR.
     * Delegates to `ec2.Peer.ipv4()` which validates octets and prefix length.
     */
    addIngressFromCidr(cidr: string, port: number, description: string): void {
        this.securityGroup.addIngressRule(
            ec2.Peer.ipv4(cidr),
            ec2.Port.tcp(port),
            description,
        );
    }

    /**
     * Add ingress rule for a specific port from another tier's security group
     */
    addIngressFromTier(
        source: TierSecurityGroupConstruct,
        port: number,
        description: string,
    ): void {
        this.securityGroup.addIngressRule(
            source.securityGroup,
            ec2.Port.tcp(port),
            description,
        );
    }
}
