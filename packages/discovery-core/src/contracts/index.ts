export * from './pod-list.js';
