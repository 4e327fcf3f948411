/**
 * Logging Types
 */

export type { Logger } from 'winston';

export interface LoggerMeta {
  service: string;
  module: string;
  env: string;
  version?: string;
  instanceId?: string;
}
