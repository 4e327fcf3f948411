export * from './credential-loader.js';
