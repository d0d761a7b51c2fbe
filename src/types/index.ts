/**
 * Barrel export for all type definitions
 */

export * from './config';
export * from './work-item';
export * from './provider';
export * from './state';
export * from './step';
