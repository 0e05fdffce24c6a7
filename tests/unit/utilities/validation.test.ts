/**
 * @format
 * Validation Utilities Unit Tests
 */

import {
    assertValid,
    validateCidr,
    validateGp3Volume,
    validateKeyPairName,
    validateRegion,
    validateStackPrefix,
} from '../../../lib/utilities/validation';

describe('Validation utilities', () => {
    describe('validateCidr', () => {
        it.each(['10.0.0.0/16', '203.0.113.10/32', '0.0.0.0/0'])('should accept %s', (cidr) => {
            expect(validateCidr(cidr)).toEqual({ valid: true });
        });

        it('should reject a malformed CIDR', () => {
            expect(validateCidr('10.0.0/16')).toEqual({
                valid: false,
                error: 'Invalid CIDR format: 10.0.0/16. Expected format: x.x.x.x/y',
            });
        });

        it('should reject an octet above 255', () => {
            expect(validateCidr('10.0.300.0/24').error).toBe('Invalid IP octet in CIDR: 10.0.300.0/24');
        });

        it('should reject a prefix above 32', () => {
            expect(validateCidr('10.0.0.0/33').error)
                .toBe('Invalid prefix length in CIDR: 10.0.0.0/33. Must be 0-32');
        });
    });

    describe('validateStackPrefix', () => {
        it('should accept a prefix of 20 characters', () => {
            expect(validateStackPrefix('a'.repeat(20)).valid).toBe(true);
        });

        it('should reject a prefix of 21 characters', () => {
            expect(validateStackPrefix('a'.repeat(21)).error)
                .toBe(`Stack prefix '${'a'.repeat(21)}' is 21 characters; maximum is 20`);
        });

        it.each(['1app', 'my_app', 'my app', ''])('should reject %p', (prefix) => {
            expect(validateStackPrefix(prefix).valid).toBe(false);
        });

        it('should reject a trailing hyphen', () => {
            expect(validateStackPrefix('app-').error)
                .toBe("Invalid stack prefix: 'app-'. Must not end with a hyphen");
        });
    });

    describe('validateRegion', () => {
        it.each(['us-east-1', 'eu-west-2', 'us-gov-west-1', 'ap-southeast-2'])('should accept %s', (region) => {
            expect(validateRegion(region).valid).toBe(true);
        });

        it.each(['useast1', 'US-EAST-1', 'us-east'])('should reject %s', (region) => {
            expect(validateRegion(region).valid).toBe(false);
        });
    });

    describe('validateKeyPairName', () => {
        it('should accept printable ASCII', () => {
            expect(validateKeyPairName('test-key').valid).toBe(true);
        });

        it('should reject empty and overlong names', () => {
            expect(validateKeyPairName('').valid).toBe(false);
            expect(validateKeyPairName('k'.repeat(256)).valid).toBe(false);
        });
    });

    describe('validateGp3Volume', () => {
        it('should accept the GP3 baseline', () => {
            expect(validateGp3Volume(3000, 125).valid).toBe(true);
        });

        it('should skip unset values', () => {
            expect(validateGp3Volume().valid).toBe(true);
        });
    });

    describe('assertValid', () => {
        it('should throw the validation error', () => {
            expect(() => assertValid(validateCidr('bad'))).toThrow('Invalid CIDR format: bad');
        });

        it('should not throw for a valid result', () => {
            expect(() => assertValid({ valid: true })).not.toThrow();
        });
    });
});
