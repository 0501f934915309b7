export * from './ticket-storage.js';
export * from './service-registry.js';
export * from './caller-authenticator.js';
