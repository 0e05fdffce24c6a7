/**
 * @format
 * Stack Plan Unit Tests
 */

import { TIER_PARAMETERS } from '../../../lib/stacks/contract';
import { creationOrder, planStack, teardownOrder } from '../../../scripts/deployment/stacks';
import { testDeploymentConfig } from '../../fixtures';

describe('Stack plan', () => {
    const config = testDeploymentConfig({ stackPrefix: 'shop', keyPairName: 'ops-key' });

    it('should plan stacks in creation order', () => {
        expect(creationOrder(config).map(p => p.stackName)).toEqual([
            'shop-network',
            'shop-database',
            'shop-alb',
            'shop-web',
            'shop-app',
        ]);
    });

    it('should tear down in the exact reverse order', () => {
        expect(teardownOrder(config).map(p => p.tier)).toEqual(['app', 'web', 'alb', 'database', 'network']);
    });

    it('should give the network stack no parameters', () => {
        expect(planStack('network', config)).toEqual({
            tier: 'network',
            stackName: 'shop-network',
            description: 'VPC, subnets and tier security groups',
            parameters: {},
            dependsOn: [],
        });
    });

    it('should pass producer stack names and the key pair to the web tier', () => {
        const plan = planStack('web', config);
        expect(plan.parameters).toEqual({
            NetworkStackName: 'shop-network',
            ALBStackName: 'shop-alb',
            KeyPairName: 'ops-key',
        });
        expect(plan.dependsOn).toEqual(['network', 'alb']);
    });

    it('should make the app tier depend on the database', () => {
        const plan = planStack('app', config);
        expect(plan.parameters.DatabaseStackName).toBe('shop-database');
        expect(plan.dependsOn).toEqual(['network', 'alb', 'database']);
    });

    it('should pass exactly the parameters each template declares', () => {
        creationOrder(config).forEach(plan => {
            expect(Object.keys(plan.parameters)).toEqual([...TIER_PARAMETERS[plan.tier]]);
        });
    });

    it('should only depend on tiers created earlier', () => {
        const plans = creationOrder(config);
        plans.forEach((plan, index) => {
            const earlier = plans.slice(0, index).map(p => p.tier);
            plan.dependsOn.forEach(tier => expect(earlier).toContain(tier));
        });
    });
});
