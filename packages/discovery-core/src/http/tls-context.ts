/**
 * TLS Context
 *
 * The API server presents a certificate signed by the cluster CA, which the
 * service account mounts next to the token.
 */

import https from 'https';
import { readValue } from '../credentials/credential-loader.js';
import { getLogger } from '../logging/logger.js';

const logger = getLogger('tls-context');

const PEM_CERTIFICATE_MARKER = '-----BEGIN CERTIFICATE-----';

export interface KubernetesAgentOptions {
  ca?: string;
  maxSockets?: number;
}

/**
 * Read the PEM bundle at startup. A missing or non-PEM file falls back to the default trust store.
 */
export function loadCaCertificate(path: string): string | undefined {
  const pem = readValue(path, 'api-ca');
  if (pem === undefined) return undefined;

  if (!pem.includes(PEM_CERTIFICATE_MARKER)) {
    logger.warn(`File at ${path} does not contain a PEM certificate; using the default trust store`, { path });
    return undefined;
  }
  return pem;
}

export function createKubernetesHttpsAgent(options: KubernetesAgentOptions = {}): https.Agent {
  return new https.Agent({
    keepAlive: true,
    keepAliveMsecs: 1000,
    maxSockets: options.maxSockets ?? 20,
    maxFreeSockets: 5,
    ...(options.ca !== undefined && { ca: options.ca }),
  });
}
