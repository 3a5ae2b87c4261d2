export const name = '@faultline/core';

export * from './config/loader';
export * from './dataset/instances';
export * from './environment/provider';
export * from './state/session';
export * from './verify/runner';
export * from './orchestrator';
