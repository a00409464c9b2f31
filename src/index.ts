/**
 * learnings-capture package entrypoint (library-safe exports only)
 */

export * from './core/index.js';
export * from './extraction/index.js';
export * from './capture/index.js';
export { runSubagentStop, type SubagentStopOptions } from './commands/subagent-stop.js';
export { runSessionStop, type SessionStopOptions } from './commands/session-stop.js';
export { runExtraction, type ExtractResult } from './commands/extract.js';
