export * from './matcher.js';
export * from './resolver.js';
export * from './universe.js';
export * from './scene-planner.js';
export * from './scene-prompt.js';
