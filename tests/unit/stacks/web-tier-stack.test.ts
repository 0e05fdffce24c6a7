/**
 * @format
 * WebTierStack Unit Tests
 */

import { Environment } from '../../../lib/config';
import {
    createThreeTierApp,
    importValueOf,
    Match,
    singleLogicalId,
    StackAssertions,
    TEST_KEY_PAIR,
    TEST_PREFIX,
    userDataText,
} from '../../fixtures';

describe('WebTierStack', () => {
    const { templates } = createThreeTierApp();
    const template = templates.web;

    describe('Parameters', () => {
        it('should take the network and load balancer stack names', () => {
            template.hasParameter('NetworkStackName', { Default: `${TEST_PREFIX}-network` });
            template.hasParameter('ALBStackName', { Default: `${TEST_PREFIX}-alb` });
        });

        it('should take an existing key pair', () => {
            template.hasParameter('KeyPairName', {
                Type: 'AWS::EC2::KeyPair::KeyName',
                Default: TEST_KEY_PAIR,
            });
        });
    });

    describe('Launch Template', () => {
        it('should name the launch template after the tier', () => {
            template.hasResourceProperties('AWS::EC2::LaunchTemplate', {
                LaunchTemplateName: `${TEST_PREFIX}-web-lt`,
            });
        });

        it('should require IMDSv2', () => {
            StackAssertions.hasImdsV2Required(template);
        });

        it('should use the key pair parameter and the imported web tier group', () => {
            template.hasResourceProperties('AWS::EC2::LaunchTemplate', {
                LaunchTemplateData: Match.objectLike({
                    KeyName: { Ref: 'KeyPairName' },
                    InstanceType: 't3.micro',
                    SecurityGroupIds: [importValueOf('NetworkStackName', 'WebTierSecurityGroup')],
                }),
            });
        });

        it('should encrypt the gp3 root volume', () => {
            template.hasResourceProperties('AWS::EC2::LaunchTemplate', {
                LaunchTemplateData: Match.objectLike({
                    BlockDeviceMappings: [
                        {
                            DeviceName: '/dev/xvda',
                            Ebs: Match.objectLike({
                                Encrypted: true,
                                VolumeType: 'gp3',
                                VolumeSize: 8,
                            }),
                        },
                    ],
                }),
            });
        });

        it('should grant the instance role SSM access', () => {
            template.hasResourceProperties('AWS::IAM::Role', {
                ManagedPolicyArns: Match.arrayWith([
                    {
                        'Fn::Join': ['', ['arn:', { Ref: 'AWS::Partition' }, ':iam::aws:policy/AmazonSSMManagedInstanceCore']],
                    },
                ]),
            });
        });
    });

    describe('Auto Scaling Group', () => {
        it('should apply development capacity', () => {
            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                AutoScalingGroupName: `${TEST_PREFIX}-web-asg`,
                MinSize: '1',
                MaxSize: '2',
            });
        });

        it('should run in the public subnets', () => {
            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                VPCZoneIdentifier: [
                    importValueOf('NetworkStackName', 'PublicSubnet1'),
                    importValueOf('NetworkStackName', 'PublicSubnet2'),
                ],
            });
        });

        it('should register with the imported web target group', () => {
            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                TargetGroupARNs: [importValueOf('ALBStackName', 'WebTargetGroupArn')],
            });
        });

        it('should wait for instance signals on create and update', () => {
            template.hasResource('AWS::AutoScaling::AutoScalingGroup', {
                CreationPolicy: {
                    ResourceSignal: Match.objectLike({ Timeout: 'PT10M' }),
                },
                UpdatePolicy: {
                    AutoScalingRollingUpdate: Match.objectLike({
                        MaxBatchSize: 1,
                        MinInstancesInService: 1,
                        PauseTime: 'PT10M',
                        WaitOnResourceSignals: true,
                    }),
                },
            });
        });

        it('should scale on average CPU', () => {
            template.hasResourceProperties('AWS::AutoScaling::ScalingPolicy', {
                PolicyType: 'TargetTrackingScaling',
                TargetTrackingConfiguration: Match.objectLike({
                    PredefinedMetricSpecification: { PredefinedMetricType: 'ASGAverageCPUUtilization' },
                    TargetValue: 70,
                }),
            });
        });
    });

    describe('User Data', () => {
        const script = userDataText(template);

        it('should install and configure nginx', () => {
            expect(script).toContain('dnf install -y nginx');
            expect(script).toContain('location /api/ {');
            expect(script).toContain('proxy_pass http://<token>/;');
        });

        it('should title the page with the stack prefix', () => {
            expect(script).toContain(`<h1>${TEST_PREFIX}</h1>`);
        });

        it('should signal the Auto Scaling Group resource', () => {
            const asgLogicalId = singleLogicalId(template, 'AWS::AutoScaling::AutoScalingGroup');
            expect(script).toContain('/opt/aws/bin/cfn-signal --success true');
            expect(script).toContain(`--resource "${asgLogicalId}"`);
        });
    });

    describe('Production', () => {
        it('should apply production capacity and monitoring', () => {
            const { templates: prod } = createThreeTierApp({ environment: Environment.PRODUCTION });
            prod.web.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                MinSize: '2',
                MaxSize: '6',
            });
            prod.web.hasResourceProperties('AWS::EC2::LaunchTemplate', {
                LaunchTemplateData: Match.objectLike({
                    InstanceType: 't3.small',
                    Monitoring: { Enabled: true },
                }),
            });
        });
    });

    describe('Outputs', () => {
        it('should export the Auto Scaling Group name', () => {
            StackAssertions.hasExportedOutput(template, 'WebAutoScalingGroupName');
        });
    });
});
