export * from './constants.js';
export * from './types/checks.js';
export * from './types/session.js';
export * from './types/environment.js';
export * from './types/api.js';
export * from './config/environments.js';
