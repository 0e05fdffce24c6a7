/**
 * @format
 * Environment Configuration Unit Tests
 */

import * as cdk from 'aws-cdk-lib/core';

import {
    Environment,
    environmentRemovalPolicy,
    getThreeTierConfigs,
    isProductionEnvironment,
    isValidEnvironment,
    resolveEnvironment,
} from '../../../lib/config';

describe('Environment configuration', () => {
    describe('resolveEnvironment', () => {
        it.each([
            ['development', Environment.DEVELOPMENT],
            ['dev', Environment.DEVELOPMENT],
            ['stage', Environment.STAGING],
            ['PROD', Environment.PRODUCTION],
            ['', Environment.DEVELOPMENT],
        ])('should resolve %p', (value, expected) => {
            expect(resolveEnvironment(value)).toBe(expected);
        });

        it('should default to development', () => {
            expect(resolveEnvironment()).toBe(Environment.DEVELOPMENT);
        });

        it('should list the valid names for an unknown environment', () => {
            expect(() => resolveEnvironment('qa')).toThrow(
                "Unknown environment 'qa'. Valid environments: development, staging, production (or dev, stage, prod)",
            );
        });
    });

    it('should recognise full and short names', () => {
        expect(isValidEnvironment('staging')).toBe(true);
        expect(isValidEnvironment('prod')).toBe(true);
        expect(isValidEnvironment('qa')).toBe(false);
    });

    it('should retain resources only in production', () => {
        expect(isProductionEnvironment(Environment.PRODUCTION)).toBe(true);
        expect(environmentRemovalPolicy(Environment.PRODUCTION)).toBe(cdk.RemovalPolicy.RETAIN);
        expect(environmentRemovalPolicy(Environment.STAGING)).toBe(cdk.RemovalPolicy.DESTROY);
    });

    describe('getThreeTierConfigs', () => {
        it('should give each environment a distinct VPC CIDR', () => {
            const cidrs = Object.values(Environment).map(env => getThreeTierConfigs(env).network.vpcCidr);
            expect(cidrs).toEqual(['10.0.0.0/16', '10.1.0.0/16', '10.2.0.0/16']);
        });

        it('should protect the production database', () => {
            const { database } = getThreeTierConfigs(Environment.PRODUCTION);
            expect(database.multiAz).toBe(true);
            expect(database.backupRetentionDays).toBe(14);
        });

        it.each(Object.values(Environment))('should keep %s capacity ranges valid', (env) => {
            const { web, app } = getThreeTierConfigs(env);
            [web, app].forEach(tier => {
                expect(tier.minCapacity).toBeGreaterThanOrEqual(1);
                expect(tier.minCapacity).toBeLessThanOrEqual(tier.maxCapacity);
            });
        });
    });
});
