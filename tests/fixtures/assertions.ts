/**
 * @format
 * Reusable assertion helpers for three-tier stack tests
 */

import { Match, Template } from 'aws-cdk-lib/assertions';

/**
 * An `Fn::ImportValue` of `{<parameter>}-{outputKey}`
 */
export interface ImportReference {
    parameter: string;
    outputKey: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseImport(value: unknown): ImportReference {
    if (isRecord(value)) {
        const join = value['Fn::Join'];
        if (Array.isArray(join) && join[0] === '-' && Array.isArray(join[1])) {
            const [ref, outputKey] = join[1];
            if (isRecord(ref) && typeof ref.Ref === 'string' && typeof outputKey === 'string') {
                return { parameter: ref.Ref, outputKey };
            }
        }
    }
    throw new Error(`Unexpected Fn::ImportValue shape: ${JSON.stringify(value)}`);
}

/**
 * Every Fn::ImportValue anywhere in a template
 */
export function collectImports(template: Template): ImportReference[] {
    const imports: ImportReference[] = [];

    const visit = (node: unknown): void => {
        if (Array.isArray(node)) {
            node.forEach(visit);
            return;
        }
        if (!isRecord(node)) {
            return;
        }
        for (const [key, value] of Object.entries(node)) {
            if (key === 'Fn::ImportValue') {
                imports.push(parseImport(value));
            } else {
                visit(value);
            }
        }
    };

    visit(template.toJSON());
    return imports;
}

/**
 * Literal text of the (single) launch template's user data, with every
 * CloudFormation token replaced by `<token>`
 */
export function userDataText(template: Template): string {
    const launchTemplates = Object.values(template.findResources('AWS::EC2::LaunchTemplate'));
    if (launchTemplates.length !== 1) {
        throw new Error(`Expected 1 launch template, found ${launchTemplates.length}`);
    }

    const resource: unknown = launchTemplates[0];
    const properties = isRecord(resource) ? resource.Properties : undefined;
    const data = isRecord(properties) ? properties.LaunchTemplateData : undefined;
    const userData = isRecord(data) ? data.UserData : undefined;
    const base64 = isRecord(userData) ? userData['Fn::Base64'] : undefined;

    if (typeof base64 === 'string') {
        return base64;
    }
    const join = isRecord(base64) ? base64['Fn::Join'] : undefined;
    if (Array.isArray(join) && Array.isArray(join[1])) {
        const parts: unknown[] = join[1];
        return parts.map((part) => (typeof part === 'string' ? part : '<token>')).join('');
    }
    throw new Error('Launch template has no Fn::Base64 user data');
}

/**
 * Logical ID of the only resource of a type
 */
export function singleLogicalId(template: Template, resourceType: string): string {
    const ids = Object.keys(template.findResources(resourceType));
    if (ids.length !== 1) {
        throw new Error(`Expected 1 ${resourceType}, found ${ids.length}`);
    }
    return ids[0];
}

/**
 * The value CDK renders for `{AWS::StackName}-{outputKey}`
 */
export function exportNameOf(outputKey: string): unknown {
    return { 'Fn::Join': ['', [{ Ref: 'AWS::StackName' }, `-${outputKey}`]] };
}

/**
 * The value CDK renders for an import through a stack-name parameter
 */
export function importValueOf(parameter: string, outputKey: string): unknown {
    return { 'Fn::ImportValue': { 'Fn::Join': ['-', [{ Ref: parameter }, outputKey]] } };
}

/**
 * Collection of reusable stack assertions
 */
export const StackAssertions = {
    /**
     * Assert that an EC2 launch template requires IMDSv2
     */
    hasImdsV2Required(template: Template): void {
        template.hasResourceProperties('AWS::EC2::LaunchTemplate', {
            LaunchTemplateData: Match.objectLike({
                MetadataOptions: Match.objectLike({
                    HttpTokens: 'required',
                }),
            }),
        });
    },

    /**
     * Assert that an output is exported as `{AWS::StackName}-{outputKey}`
     */
    hasExportedOutput(template: Template, outputKey: string): void {
        template.hasOutput(outputKey, {
            Export: { Name: exportNameOf(outputKey) },
        });
    },

    /**
     * Assert that a Name tag is applied with expected value
     */
    hasNameTag(template: Template, resourceType: string, expectedName: string): void {
        template.hasResourceProperties(resourceType, {
            Tags: Match.arrayWith([Match.objectLike({ Key: 'Name', Value: expectedName })]),
        });
    },

    /**
     * Assert that a tag is applied with expected value
     */
    hasTag(template: Template, resourceType: string, key: string, value: string): void {
        template.hasResourceProperties(resourceType, {
            Tags: Match.arrayWith([Match.objectLike({ Key: key, Value: value })]),
        });
    },
};

/**
 * Re-export Match for convenience in test files
 */
export { Match } from 'aws-cdk-lib/assertions';
