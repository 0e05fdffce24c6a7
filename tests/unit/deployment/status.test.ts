/**
 * @format
 * Status and List Command Unit Tests
 */

import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { EC2Client } from '@aws-sdk/client-ec2';
import { STSClient } from '@aws-sdk/client-sts';
import { mockClient } from 'aws-sdk-client-mock';

import { listCommand } from '../../../scripts/deployment/list';
import { NOT_FOUND, statusCommand } from '../../../scripts/deployment/status';
import { FakeCloudFormation, testDeploymentConfig } from '../../fixtures';

const cfnMock = mockClient(CloudFormationClient);

describe('statusCommand', () => {
    let fake: FakeCloudFormation;
    let log: jest.SpyInstance;

    beforeEach(() => {
        cfnMock.reset();
        fake = new FakeCloudFormation(cfnMock);
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should report status and outputs in creation order', async () => {
        fake.addStack('test-app-network', 'CREATE_COMPLETE', { VPCID: 'vpc-123' });
        fake.addStack('test-app-alb', 'UPDATE_ROLLBACK_COMPLETE', { ALBDNSName: 'web.example.com' });

        const reports = await statusCommand(testDeploymentConfig(), {
            cloudformation: new CloudFormationClient({ region: 'us-east-1' }),
            ec2: new EC2Client({ region: 'us-east-1' }),
            sts: new STSClient({ region: 'us-east-1' }),
        });

        expect(reports).toEqual([
            { stackName: 'test-app-network', status: 'CREATE_COMPLETE', outputs: { VPCID: 'vpc-123' } },
            { stackName: 'test-app-database', status: NOT_FOUND, outputs: {} },
            { stackName: 'test-app-alb', status: 'UPDATE_ROLLBACK_COMPLETE', outputs: { ALBDNSName: 'web.example.com' } },
            { stackName: 'test-app-web', status: NOT_FOUND, outputs: {} },
            { stackName: 'test-app-app', status: NOT_FOUND, outputs: {} },
        ]);
        expect(log.mock.calls.flat().some(arg => String(arg).includes('VPCID=vpc-123'))).toBe(true);
    });
});

describe('listCommand', () => {
    beforeEach(() => {
        cfnMock.reset();
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should return the plan without calling AWS', () => {
        const plans = listCommand(testDeploymentConfig());
        expect(plans.map(p => p.tier)).toEqual(['network', 'database', 'alb', 'web', 'app']);
        expect(cfnMock.calls()).toHaveLength(0);
    });
});
