export * from './markdown.js';
export * from './list-items.js';
export * from './sections.js';
export * from './transcript.js';
export * from './agent-identity.js';
export * from './learnings.js';
