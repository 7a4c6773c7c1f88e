/**
 * Config Module Exports
 */

export * from './health-config';
export * from './smoke-config';
