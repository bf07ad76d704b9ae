// Tenant types
export type * from './tenant.js';

// Client types
export type * from './client.js';

// Token types
export type * from './token.js';

// User types
export type * from './user.js';

// Rate limit types
export type * from './rate-limit.js';

// Hono context types
export type * from './hono.js';

// Wire types
export type * from '@tenantauth/shared';
