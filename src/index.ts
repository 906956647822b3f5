export * from './change-detection/index.js';
export * from './playback/index.js';
