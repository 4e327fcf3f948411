/**
 * Kubernetes Discovery Core
 *
 * Resolves service names to live pod endpoints through the Kubernetes API:
 * - Service discovery contract and the Kubernetes API resolver
 * - Pod-list wire contract and target extraction
 * - Settings with environment overrides
 * - Structured logging and the discovery error taxonomy
 */

export * from './config/index.js';
export * from './contracts/index.js';
export * from './credentials/index.js';
export * from './discovery/index.js';
export * from './error-handling/index.js';
export * from './http/index.js';
export * from './logging/index.js';
