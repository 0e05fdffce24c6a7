/**
 * @format
 * Stacks - Central Export
 */

export * from './contract';
export * from './network-stack';
export * from './database-stack';
export * from './alb-stack';
export * from './web-tier-stack';
export * from './app-tier-stack';
