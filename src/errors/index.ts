/**
 * Barrel export for all custom error classes
 */

export * from './invalid-identifier-error';
export * from './not-found-error';
export * from './dirty-worktree-error';
export * from './push-required-error';
export * from './missing-credentials-error';
export * from './missing-provider-info-error';
export * from './network-error';
export * from './http-error';
export * from './unknown-provider-error';
export * from './no-provider-configured-error';
export * from './unexpected-response-error';
export * from './validation-error';
export * from './git-operation-error';
