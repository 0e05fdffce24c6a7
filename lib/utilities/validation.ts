/**
 * @format
 * Validation Utilities
 *
 * Input validation helpers shared by the CDK stacks and the deployment CLI.
 */

/**
 * Validation result
 */
export interface ValidationResult {
    readonly valid: boolean;
    readonly error?: string;
}

/**
 * Longest stack prefix accepted.
 * `{prefix}-app-alb` and `{prefix}-web-tg` must fit the 32-character ALB and
 * target group name limit.
 */
export const MAX_STACK_PREFIX_LENGTH = 20;

/**
 * Validate CIDR block format
 */
export function validateCidr(cidr: string): ValidationResult {
    const cidrRegex = /^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/;
    if (!cidrRegex.test(cidr)) {
        return {
            valid: false,
            error: `Invalid CIDR format: ${cidr}. Expected format: x.x.x.x/y`,
        };
    }

    const [address, prefixPart] = cidr.split('/');
    const octets = address.split('.').map(Number);
    for (const octet of octets) {
        if (octet < 0 || octet > 255) {
            return {
                valid: false,
                error: `Invalid IP octet in CIDR: ${cidr}`,
            };
        }
    }

    const prefix = parseInt(prefixPart, 10);
    if (prefix < 0 || prefix > 32) {
        return {
            valid: false,
            error: `Invalid prefix length in CIDR: ${cidr}. Must be 0-32`,
        };
    }

    return { valid: true };
}

/**
 * Validate a stack prefix.
 *
 * CloudFormation stack names must start with a letter and contain only
 * letters, digits and hyphens.
 */
export function validateStackPrefix(prefix: string): ValidationResult {
    if (!/^[A-Za-z][A-Za-z0-9-]*$/.test(prefix)) {
        return {
            valid: false,
            error: `Invalid stack prefix: '${prefix}'. Must start with a letter and contain only letters, digits and hyphens`,
        };
    }

    if (prefix.endsWith('-')) {
        return {
            valid: false,
            error: `Invalid stack prefix: '${prefix}'. Must not end with a hyphen`,
        };
    }

    if (prefix.length > MAX_STACK_PREFIX_LENGTH) {
        return {
            valid: false,
            error: `Stack prefix '${prefix}' is ${prefix.length} characters; maximum is ${MAX_STACK_PREFIX_LENGTH}`,
        };
    }

    return { valid: true };
}

/**
 * Validate AWS region format (eu-west-1, us-gov-west-1, ap-southeast-2, ...)
 */
export function validateRegion(region: string): ValidationResult {
    if (!/^[a-z]{2}(-[a-z]+)+-\d$/.test(region)) {
        return {
            valid: false,
            error: `Invalid AWS region format: ${region}. Expected format: us-east-1, eu-west-1, etc.`,
        };
    }
    return { valid: true };
}

/**
 * Validate an EC2 key pair name (1-255 printable ASCII characters)
 */
export function validateKeyPairName(name: string): ValidationResult {
    if (name.length === 0 || name.length > 255 || !/^[\x20-\x7E]+$/.test(name)) {
        return {
            valid: false,
            error: `Invalid key pair name: '${name}'. Must be 1-255 printable ASCII characters`,
        };
    }
    return { valid: true };
}

/**
 * Validate GP3 volume configuration
 */
export function validateGp3Volume(iops?: number, throughput?: number): ValidationResult {
    if (iops !== undefined) {
        if (iops < 3000 || iops > 16000) {
            return {
                valid: false,
                error: 'GP3 IOPS must be between 3000 and 16000',
            };
        }
    }

    if (throughput !== undefined) {
        if (throughput < 125 || throughput > 1000) {
            return {
                valid: false,
                error: 'GP3 throughput must be between 125 and 1000 MiB/s',
            };
        }
    }

    return { valid: true };
}

/**
 * Throw the validation error, if any
 */
export function assertValid(result: ValidationResult): void {
    if (!result.valid) {
        throw new Error(result.error);
    }
}
