/**
 * Kubernetes API Service Discovery
 *
 * Resolves a service name to the pods currently carrying its label, by asking
 * the API server directly instead of going through DNS. Readiness and health
 * checks on the pods therefore have no effect on what a lookup returns.
 *
 * Token, namespace and TLS agent are fixed at construction; the API server
 * host and port are read from the environment on every lookup.
 */

import type { Agent } from 'https';
import type { AxiosAdapter } from 'axios';
import {
  loadDiscoverySettings,
  type DiscoverySettings,
  type DiscoverySettingsInput,
} from '../config/discovery-settings.js';
import type { EnvSource } from '../config/environment-config.js';
import type { PodList } from '../contracts/pod-list.js';
import { loadCredentials, type DiscoveryCredentials } from '../credentials/credential-loader.js';
import { ConfigurationMissingError, wrapDiscoveryError } from '../error-handling/errors.js';
import { KubernetesApiClient } from '../http/kubernetes-api-client.js';
import { buildPodRequest, formatLabelSelector } from '../http/request-builder.js';
import { createKubernetesHttpsAgent, loadCaCertificate } from '../http/tls-context.js';
import { getLogger } from '../logging/logger.js';
import { toLookup, type Lookup, type Resolved, type ServiceDiscovery } from './service-discovery.js';
import { collectPortNames, deriveTargets } from './target-extractor.js';

const logger = getLogger('kubernetes-api-service-discovery');

export interface KubernetesApiServiceDiscoveryOptions {
  /** Source of the API server host/port variables; defaults to process.env. */
  env?: EnvSource;
  /** Skips loading the CA file. */
  httpsAgent?: Agent;
  adapter?: AxiosAdapter;
}

export class KubernetesApiServiceDiscovery implements ServiceDiscovery {
  private readonly settings: DiscoverySettings;
  private readonly credentials: DiscoveryCredentials;
  private readonly apiClient: KubernetesApiClient;
  private readonly env: EnvSource;

  constructor(settings: DiscoverySettings, options: KubernetesApiServiceDiscoveryOptions = {}) {
    this.settings = settings;
    this.env = options.env ?? process.env;
    this.credentials = loadCredentials(settings);

    const httpsAgent =
      options.httpsAgent ??
      createKubernetesHttpsAgent({
        ca: loadCaCertificate(settings.apiCaPath),
        maxSockets: settings.maxSockets,
      });

    this.apiClient = new KubernetesApiClient({ httpsAgent, adapter: options.adapter });
  }

  get podNamespace(): string {
    return this.credentials.podNamespace;
  }

  async lookup(query: Lookup | string, resolveTimeoutMs: number): Promise<Resolved> {
    const lookup = toLookup(query);
    const labelSelector = formatLabelSelector(this.settings.podLabelSelector, lookup.serviceName);
    const portName = lookup.portName ?? this.settings.podPortName;
    const { apiToken, podNamespace } = this.credentials;

    logger.info(
      `Querying for pods with label selector: [${labelSelector}]. Namespace: [${podNamespace}]. ` +
        `Port: [${portName}] (from lookup? ${lookup.portName !== undefined})`,
      { serviceName: lookup.serviceName, labelSelector, podNamespace, portName }
    );

    try {
      const request = buildPodRequest(apiToken, podNamespace, labelSelector, this.settings, this.env);
      if (!request) {
        const { apiServiceHostEnvName, apiServicePortEnvName } = this.settings;
        throw new ConfigurationMissingError(
          'Unable to form request; check Kubernetes environment ' +
            `(expecting env vars ${apiServiceHostEnvName}, ${apiServicePortEnvName})`,
          { envVars: [apiServiceHostEnvName, apiServicePortEnvName] }
        );
      }

      const podList = await this.apiClient.fetchPods(request, resolveTimeoutMs);
      const addresses = deriveTargets(podList, portName, podNamespace, this.settings.podDomain);

      if (addresses.length === 0 && podList.items.length > 0) {
        this.reportNoTargets(podList, portName);
      }

      return { serviceName: lookup.serviceName, addresses };
    } catch (error) {
      throw wrapDiscoveryError(error);
    }
  }

  private reportNoTargets(podList: PodList, portName: string): void {
    if (!logger.isWarnEnabled()) return;

    const portNames = collectPortNames(podList);
    logger.warn(
      'No targets found from pod list. Is the correct port name configured? ' +
        `Current configuration: [${portName}]. Ports on pods: [${portNames.join(', ')}]`,
      { portName, portNames, podCount: podList.items.length }
    );
  }
}

export function createKubernetesApiServiceDiscovery(
  overrides: DiscoverySettingsInput = {},
  options: KubernetesApiServiceDiscoveryOptions = {}
): KubernetesApiServiceDiscovery {
  const settings = loadDiscoverySettings(overrides, options.env ?? process.env);
  return new KubernetesApiServiceDiscovery(settings, options);
}
