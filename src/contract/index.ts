export * from './actions.js';
export * from './next-step.js';
export * from './preflight-check.js';
