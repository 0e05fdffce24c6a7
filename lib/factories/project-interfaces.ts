/**
 * @format
 * Project Factory Interfaces
 *
 * Defines the interface for factories that create a project's stacks.
 * The factory owns sizing and naming; the caller only provides the
 * resolved deployment settings.
 */

import * as cdk from 'aws-cdk-lib/core';

import { Environment } from '../config/environments';

/**
 * Base context passed to project factories for stack creation.
 */
export interface ProjectFactoryContext {
    /** Target environment */
    readonly environment: Environment;
}

/**
 * Result of creating all stacks for a project
 *
 * @typeParam TKey - Keys of the stack map (e.g. tier names)
 */
export interface ProjectStackFamily<TKey extends string = string> {
    /** All stacks created by the factory, in dependency order */
    readonly stacks: cdk.Stack[];
    /** Map of stack key to stack instance */
    readonly stackMap: Record<TKey, cdk.Stack>;
}

/**
 * Interface for project factories.
 *
 * @typeParam TContext - Factory-specific context extending ProjectFactoryContext
 * @typeParam TKey - Keys of the returned stack map
 */
export interface IProjectFactory<
    TContext extends ProjectFactoryContext = ProjectFactoryContext,
    TKey extends string = string,
> {
    /** The target environment */
    readonly environment: Environment;
    /** The namespace prefix for stack names */
    readonly namespace: string;

    /**
     * Create all stacks for this project.
     *
     * @param scope - CDK app or stage
     * @param context - Typed context with environment and project-specific settings
     */
    createAllStacks(scope: cdk.App, context: TContext): ProjectStackFamily<TKey>;
}
