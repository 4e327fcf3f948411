/**
 * Target Extractor
 *
 * Turns a pod list into resolved targets. Name filtering already happened
 * server-side through the label selector; this only looks at pod state and
 * container ports.
 */

import { isIP } from 'net';
import type { PodList } from '../contracts/pod-list.js';
import { AddressResolutionError } from '../error-handling/errors.js';
import type { ResolvedAddress, ResolvedTarget } from './service-discovery.js';

export function podHostname(ip: string, namespace: string, domain: string): string {
  return `${ip.replace(/\./g, '-')}.${namespace}.pod.${domain}`;
}

/**
 * Lower-case, zero-compressed form of an IPv6 literal. Zone-scoped addresses,
 * which URL hosts cannot carry, are returned as given.
 */
function normalizeIPv6(ip: string): string {
  try {
    return new URL(`http://[${ip}]`).hostname.slice(1, -1);
  } catch {
    return ip;
  }
}

/**
 * Parse an IP literal. Hostnames are rejected; the API only reports numeric pod IPs.
 */
export function resolveAddress(ip: string): ResolvedAddress {
  const family = isIP(ip);
  if (family === 4) return { address: ip, family: 4 };
  if (family === 6) return { address: normalizeIPv6(ip), family: 6 };
  throw new AddressResolutionError(ip);
}

export function deriveTargets(
  podList: PodList,
  portName: string,
  namespace: string,
  domain: string
): ResolvedTarget[] {
  const targets: ResolvedTarget[] = [];

  for (const pod of podList.items) {
    // Terminating
    if (pod.metadata?.deletionTimestamp) continue;

    const ip = pod.status?.podIP;
    if (!ip) continue;

    for (const container of pod.spec?.containers ?? []) {
      for (const port of container.ports ?? []) {
        // Unnamed ports never match, an empty name included
        if (!port.name || port.name !== portName) continue;

        targets.push({
          host: podHostname(ip, namespace, domain),
          port: port.containerPort,
          address: resolveAddress(ip),
        });
      }
    }
  }

  return targets;
}

/**
 * Distinct named container ports across every pod, for diagnosing a port-name mismatch.
 */
export function collectPortNames(podList: PodList): string[] {
  const names = new Set<string>();
  for (const pod of podList.items) {
    for (const container of pod.spec?.containers ?? []) {
      for (const port of container.ports ?? []) {
        if (port.name) names.add(port.name);
      }
    }
  }
  return [...names].sort();
}
