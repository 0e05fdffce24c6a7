/**
 * @format
 * TaggingAspect Unit Tests
 */

import { Template } from 'aws-cdk-lib/assertions';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as cdk from 'aws-cdk-lib/core';

import { organizationalTags, TaggingAspect } from '../../../lib/aspects';
import { Environment } from '../../../lib/config';

describe('TaggingAspect', () => {
    it('should build the organizational tag map', () => {
        expect(organizationalTags({
            environment: Environment.STAGING,
            project: 'shop',
            owner: 'test-owner',
        })).toEqual({
            Environment: 'staging',
            Project: 'shop',
            Owner: 'test-owner',
            ManagedBy: 'CDK',
        });
    });

    it('should include CostCenter only when set', () => {
        expect(organizationalTags({
            environment: Environment.DEVELOPMENT,
            project: 'shop',
            owner: 'test-owner',
            costCenter: 'cc-1',
        }).CostCenter).toBe('cc-1');
    });

    it('should tag every taggable resource', () => {
        const app = new cdk.App();
        const stack = new cdk.Stack(app, 'TagTestStack');
        new s3.CfnBucket(stack, 'Bucket');
        cdk.Aspects.of(app).add(new TaggingAspect({
            environment: Environment.DEVELOPMENT,
            project: 'shop',
            owner: 'test-owner',
        }));

        Template.fromStack(stack).hasResourceProperties('AWS::S3::Bucket', {
            Tags: [
                { Key: 'Environment', Value: 'development' },
                { Key: 'ManagedBy', Value: 'CDK' },
                { Key: 'Owner', Value: 'test-owner' },
                { Key: 'Project', Value: 'shop' },
            ],
        });
    });
});
