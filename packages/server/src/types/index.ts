// Shared wire and ticket types
export type * from '@grantline/shared';

// Grant pipeline types
export * from './grant.js';

// Hono context types
export * from './hono.js';
