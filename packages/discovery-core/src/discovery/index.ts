/**
 * Service Discovery Module
 */

export * from './service-discovery.js';
export * from './target-extractor.js';
export * from './kubernetes-api-service-discovery.js';
