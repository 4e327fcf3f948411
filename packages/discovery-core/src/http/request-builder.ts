/**
 * Request Builder
 *
 * Assembles the pod-list request from the API server location the kubelet
 * injects into every container's environment.
 */

import { isIPv6 } from 'net';
import type { DiscoverySettings } from '../config/discovery-settings.js';
import { LABEL_SELECTOR_PLACEHOLDER } from '../config/discovery-settings.js';
import { getOptionalConfig, type EnvSource } from '../config/environment-config.js';

export interface PodRequest {
  url: string;
  headers: {
    Authorization: string;
  };
}

type ApiServerEnvNames = Pick<DiscoverySettings, 'apiServiceHostEnvName' | 'apiServicePortEnvName'>;

const MAX_PORT = 65535;

export function formatLabelSelector(template: string, serviceName: string): string {
  return template.split(LABEL_SELECTOR_PLACEHOLDER).join(serviceName);
}

export function parsePort(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const port = Number(raw);
  return port >= 1 && port <= MAX_PORT ? port : undefined;
}

/**
 * Returns undefined when the API server host or port is missing from the environment.
 * Both variables are read on every call.
 */
export function buildPodRequest(
  token: string,
  namespace: string,
  labelSelector: string,
  envNames: ApiServerEnvNames,
  env: EnvSource = process.env
): PodRequest | undefined {
  const host = getOptionalConfig(envNames.apiServiceHostEnvName, env);
  const rawPort = getOptionalConfig(envNames.apiServicePortEnvName, env);
  if (host === undefined || rawPort === undefined) return undefined;

  const port = parsePort(rawPort);
  if (port === undefined) return undefined;

  let url: URL;
  try {
    url = new URL(`https://${isIPv6(host) ? `[${host}]` : host}:${port}`);
  } catch {
    return undefined;
  }
  url.pathname = `/api/v1/namespaces/${encodeURIComponent(namespace)}/pods`;
  url.searchParams.set('labelSelector', labelSelector);

  return {
    url: url.toString(),
    headers: { Authorization: `Bearer ${token}` },
  };
}
