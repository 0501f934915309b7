export { createTokenRoutes, type TokenRouteOptions } from './token.js';
