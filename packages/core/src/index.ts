// @membank/core - Multi-agent memory bank build engine

export const VERSION = '0.1.0';

export type * from './types/index.js';

export * from './utils/index.js';
export * from './utils/constants.js';
export * from './config/index.js';
export * from './memory/index.js';
export * from './changes/index.js';
export * from './models/index.js';
export * from './agents/index.js';
export * from './output/index.js';
export * from './engine/index.js';
