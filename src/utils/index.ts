/**
 * Barrel export for utility functions
 */

export * from './logger';
export * from './sanitize';
export * from './text';
export * from './remote-url';
export * from './http';
