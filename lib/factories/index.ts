/**
 * @format
 * Factories - Central Export
 */

export * from './project-interfaces';
