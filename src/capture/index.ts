export * from './client.js';
export * from './observation.js';
export * from './hook-input.js';
export * from './orchestrator.js';
export * from './session-check.js';
