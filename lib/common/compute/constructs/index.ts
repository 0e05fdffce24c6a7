/**
 * @format
 * Compute Constructs - Central Export
 */

export * from './auto-scaling-group';
export * from './launch-template';
