// Re-export all shared types
export type * from './types/oauth.js';
export type * from './types/api.js';
