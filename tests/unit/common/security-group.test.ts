/**
 * @format
 * TierSecurityGroupConstruct Unit Tests
 */

import { Match, Template } from 'aws-cdk-lib/assertions';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import { TierSecurityGroupConstruct } from '../../../lib/common/security/security-group';

describe('TierSecurityGroupConstruct', () => {
    const stack = new cdk.Stack(new cdk.App(), 'SgTestStack');
    const vpc = new ec2.Vpc(stack, 'Vpc', { maxAzs: 2 });
    const alb = new TierSecurityGroupConstruct(stack, 'Alb', {
        vpc,
        name: 'test-alb-sg',
        description: 'Test ALB',
    });
    const tier = new TierSecurityGroupConstruct(stack, 'Tier', {
        vpc,
        name: 'test-tier-sg',
        description: 'Test tier',
    });
    alb.addIngressFromCidr('0.0.0.0/0', 80, 'HTTP from anywhere');
    tier.addIngressFromTier(alb, 80, 'HTTP from the ALB');
    const template = Template.fromStack(stack);

    it('should add CIDR rules inline', () => {
        template.hasResourceProperties('AWS::EC2::SecurityGroup', {
            GroupDescription: 'Test ALB',
            SecurityGroupIngress: [
                {
                    CidrIp: '0.0.0.0/0',
                    Description: 'HTTP from anywhere',
                    FromPort: 80,
                    IpProtocol: 'tcp',
                    ToPort: 80,
                },
            ],
        });
    });

    it('should reference the source group for tier rules', () => {
        template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
            Description: 'HTTP from the ALB',
            FromPort: 80,
            SourceSecurityGroupId: {
                'Fn::GetAtt': [Match.stringLikeRegexp('^AlbSecurityGroup'), 'GroupId'],
            },
        });
    });

    it('should tag groups with Name and Component', () => {
        template.hasResourceProperties('AWS::EC2::SecurityGroup', {
            GroupDescription: 'Test tier',
            Tags: Match.arrayWith([
                { Key: 'Component', Value: 'security-group' },
                { Key: 'Name', Value: 'test-tier-sg' },
            ]),
        });
    });
});
