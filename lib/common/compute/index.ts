/**
 * @format
 * Compute Module - Central Export
 *
 * Organized into:
 * - constructs/ - CDK constructs (LaunchTemplate, AutoScalingGroup)
 * - builders/   - Builder patterns (UserDataBuilder)
 */

// Constructs
export * from './constructs';

// Builders
export * from './builders/user-data-builder';
