/**
 * HTTP Module - Index
 */

export type { AxiosAdapter, AxiosResponse } from 'axios';
export * from './request-builder.js';
export * from './tls-context.js';
export * from './kubernetes-api-client.js';
