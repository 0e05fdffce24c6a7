/**
 * @format
 * Tagging Aspect
 *
 * Applies the organizational tag schema to every taggable resource.
 * Constructs only add their own Name/Component tags.
 */

import * as cdk from 'aws-cdk-lib/core';

import { IConstruct } from 'constructs';

import { Environment } from '../config/environments';

/**
 * Tag configuration for resources
 */
export interface TagConfig {
    readonly environment: Environment;
    /** Project tag, normally the stack prefix */
    readonly project: string;
    readonly owner: string;
    readonly costCenter?: string;
}

/** Owner tag when PROJECT_OWNER is not set */
export const DEFAULT_OWNER = 'platform-team';

/**
 * Build the tag map a TaggingAspect applies
 */
export function organizationalTags(config: TagConfig): Record<string, string> {
    return {
        Environment: config.environment,
        Project: config.project,
        Owner: config.owner,
        ManagedBy: 'CDK',
        ...(config.costCenter ? { CostCenter: config.costCenter } : {}),
    };
}

/**
 * Aspect that applies consistent tags to all taggable resources.
 * Uses direct tag manager manipulation to avoid priority conflicts.
 */
export class TaggingAspect implements cdk.IAspect {
    private readonly tags: Record<string, string>;

    constructor(config: TagConfig) {
        this.tags = organizationalTags(config);
    }

    public visit(node: IConstruct): void {
        if (cdk.TagManager.isTaggable(node)) {
            Object.entries(this.tags).forEach(([key, value]) => {
                node.tags.setTag(key, value);
            });
        }
    }
}
