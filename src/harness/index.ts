export * from './harness.js';
export * from './session-runner.js';
