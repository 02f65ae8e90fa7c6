export * from './types.js';
export * from './persist.js';
export * from './providers/replicate.js';
export * from './providers/image.js';
export * from './providers/video.js';
export * from './reference-images.js';
export * from './first-frames.js';
export * from './clips.js';
export * from './sequencer.js';
