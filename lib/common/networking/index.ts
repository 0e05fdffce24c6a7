/**
 * @format
 * Networking Constructs - Central Export
 */

export * from './elb/application-load-balancer';
