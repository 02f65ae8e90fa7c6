export * from './ad-styles.js';
export * from './schemas.js';
export * from './generator.js';
export * from './expander.js';
export * from './judge.js';
export * from './reviser.js';
