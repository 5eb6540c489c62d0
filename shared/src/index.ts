export * from './constants.js';
export * from './sim-config.js';
export type * from './types/perception.js';
export type * from './types/activity.js';
export type * from './types/heat.js';
export type * from './types/protocol.js';
