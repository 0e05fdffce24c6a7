/**
 * @format
 * buildThreeTierApp Unit Tests
 *
 * Tagging and the optional compliance checks applied across the app.
 */

import { Template } from 'aws-cdk-lib/assertions';

import { Environment } from '../../../../lib/config';
import { buildThreeTierApp } from '../../../../lib/projects/three-tier/app-builder';
import {
    createThreeTierApp,
    StackAssertions,
    TEST_OWNER,
    TEST_PREFIX,
    testDeploymentConfig,
} from '../../../fixtures';

describe('buildThreeTierApp', () => {
    describe('Tagging', () => {
        const { templates } = createThreeTierApp();

        it('should tag resources with the organizational schema', () => {
            StackAssertions.hasTag(templates.network, 'AWS::EC2::VPC', 'Project', TEST_PREFIX);
            StackAssertions.hasTag(templates.network, 'AWS::EC2::VPC', 'Environment', 'development');
            StackAssertions.hasTag(templates.network, 'AWS::EC2::VPC', 'ManagedBy', 'CDK');
            StackAssertions.hasTag(templates.network, 'AWS::EC2::VPC', 'Owner', TEST_OWNER);
        });

        it('should tag resources in every tier', () => {
            StackAssertions.hasTag(templates.database, 'AWS::RDS::DBInstance', 'Project', TEST_PREFIX);
            StackAssertions.hasTag(
                templates.alb,
                'AWS::ElasticLoadBalancingV2::LoadBalancer',
                'Project',
                TEST_PREFIX,
            );
        });

        it('should tag the environment of the configuration', () => {
            const { templates: prod } = createThreeTierApp({ environment: Environment.PRODUCTION });
            StackAssertions.hasTag(prod.network, 'AWS::EC2::VPC', 'Environment', 'production');
        });

        it('should add a CostCenter tag only when one is given', () => {
            const { family } = buildThreeTierApp(testDeploymentConfig(), {
                owner: TEST_OWNER,
                costCenter: 'cc-1234',
            });
            StackAssertions.hasTag(
                Template.fromStack(family.stackMap.network),
                'AWS::EC2::VPC',
                'CostCenter',
                'cc-1234',
            );

            const vpcTags = Object.values(templates.network.findResources('AWS::EC2::VPC'))
                .flatMap(resource => resource.Properties.Tags)
                .map(tag => tag.Key);
            expect(vpcTags).not.toContain('CostCenter');
        });
    });

    describe('Compliance checks', () => {
        it('should record the shared suppressions on every stack when enabled', () => {
            const { family } = buildThreeTierApp(testDeploymentConfig(), {
                owner: TEST_OWNER,
                nagChecks: true,
            });

            family.stacks.forEach(stack => {
                const metadata = Template.fromStack(stack).toJSON().Metadata;
                expect(metadata.cdk_nag.rules_to_suppress).toEqual(
                    expect.arrayContaining([
                        expect.objectContaining({ id: 'AwsSolutions-EC23' }),
                        expect.objectContaining({ id: 'AwsSolutions-ELB2' }),
                    ]),
                );
            });
        });

        it('should not add suppressions by default', () => {
            const { templates } = createThreeTierApp();
            expect(templates.network.toJSON().Metadata).toBeUndefined();
        });
    });
});
