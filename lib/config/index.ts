/**
 * @format
 * Configuration - Central Export
 */

export * from './environments';
export * from './configurations';
export * from './deployment';
