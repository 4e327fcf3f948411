/**
 * Configuration Module - Index
 */

export * from './environment-config.js';
export * from './discovery-settings.js';
