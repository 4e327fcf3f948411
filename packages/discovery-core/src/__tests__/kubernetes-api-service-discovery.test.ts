import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  captureRejection,
  createKubernetesApiStub,
  createMockContainer,
  createMockPod,
  createMockPodList,
  createMockPort,
  podListResponse,
  stalled,
  type StubHandler,
} from '@kube-discovery/test-utils';
import type { DiscoverySettingsInput } from '../config/discovery-settings.js';
import type { EnvSource } from '../config/environment-config.js';
import {
  createKubernetesApiServiceDiscovery,
  type KubernetesApiServiceDiscovery,
} from '../discovery/kubernetes-api-service-discovery.js';
import {
  AddressResolutionError,
  ConfigurationMissingError,
  KubernetesApiForbiddenError,
  NetworkFailureError,
  ResolutionTimeoutError,
} from '../error-handling/errors.js';
import { getLogger } from '../logging/logger.js';

vi.mock('../logging/logger.js', async () => {
  const { createMockLogger } = await import('@kube-discovery/test-utils');
  const logger = createMockLogger();
  return { getLogger: () => logger };
});

const logger = getLogger('kubernetes-api-service-discovery.test');

const API_SERVER_ENV: EnvSource = {
  KUBERNETES_SERVICE_HOST: '10.96.0.1',
  KUBERNETES_SERVICE_PORT: '6443',
};

function httpPod(podIP: string) {
  return createMockPod({
    podIP,
    containers: [createMockContainer([createMockPort('http', 8080), createMockPort('metrics', 9090)])],
  });
}

describe('KubernetesApiServiceDiscovery', () => {
  let dir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'kube-discovery-lookup-'));
    writeFileSync(join(dir, 'token'), 'test-token\n');
    writeFileSync(join(dir, 'namespace'), 'team-a\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function createDiscovery(
    handler: StubHandler,
    env: EnvSource = { ...API_SERVER_ENV },
    overrides: DiscoverySettingsInput = {}
  ) {
    const stub = createKubernetesApiStub(handler);
    const discovery: KubernetesApiServiceDiscovery = createKubernetesApiServiceDiscovery(
      {
        apiCaPath: join(dir, 'ca.crt'),
        apiTokenPath: join(dir, 'token'),
        podNamespacePath: join(dir, 'namespace'),
        ...overrides,
      },
      { env, adapter: stub.adapter }
    );
    return { stub, discovery };
  }

  it('resolves a service name to its live pods', async () => {
    const podList = createMockPodList(
      createMockPod({ name: 'web-0', podIP: '10.1.2.3' }),
      createMockPod({ name: 'web-1', podIP: '10.1.2.4', deletionTimestamp: '2026-01-01T00:00:00Z' })
    );
    const { stub, discovery } = createDiscovery(() => podListResponse(podList));

    const resolved = await discovery.lookup('web', 1000);

    expect(resolved).toEqual({
      serviceName: 'web',
      addresses: [
        { host: '10-1-2-3.team-a.pod.cluster.local', port: 8558, address: { address: '10.1.2.3', family: 4 } },
      ],
    });
    expect(stub.requests).toHaveLength(1);
    expect(stub.requests[0]?.url).toBe(
      'https://10.96.0.1:6443/api/v1/namespaces/team-a/pods?labelSelector=app%3Dweb'
    );
    expect(stub.requests[0]?.headers.authorization).toBe('Bearer test-token');
  });

  it('logs the query it is about to issue', async () => {
    const { discovery } = createDiscovery(() => podListResponse({ items: [] }));

    await discovery.lookup({ serviceName: 'web', portName: 'http' }, 1000);

    expect(logger.info).toHaveBeenCalledWith(
      'Querying for pods with label selector: [app=web]. Namespace: [team-a]. Port: [http] (from lookup? true)',
      { serviceName: 'web', labelSelector: 'app=web', podNamespace: 'team-a', portName: 'http' }
    );
  });

  it('uses the port name from the lookup over the configured one', async () => {
    const { discovery } = createDiscovery(() => podListResponse(createMockPodList(httpPod('10.1.2.3'))));

    const resolved = await discovery.lookup({ serviceName: 'web', portName: 'metrics' }, 1000);

    expect(resolved.addresses).toEqual([
      { host: '10-1-2-3.team-a.pod.cluster.local', port: 9090, address: { address: '10.1.2.3', family: 4 } },
    ]);
  });

  it('applies the configured selector template, port name and pod domain', async () => {
    const { stub, discovery } = createDiscovery(
      () => podListResponse(createMockPodList(httpPod('10.1.2.3'))),
      { ...API_SERVER_ENV },
      { podLabelSelector: 'app.kubernetes.io/name=%s', podPortName: 'http', podDomain: 'example.internal' }
    );

    const resolved = await discovery.lookup('web', 1000);

    expect(stub.requests[0]?.url).toBe(
      'https://10.96.0.1:6443/api/v1/namespaces/team-a/pods?labelSelector=app.kubernetes.io%2Fname%3Dweb'
    );
    expect(resolved.addresses.map(target => target.host)).toEqual(['10-1-2-3.team-a.pod.example.internal']);
  });

  it('prefers injected credentials over the service-account files', async () => {
    const { stub, discovery } = createDiscovery(
      () => podListResponse({ items: [] }),
      { ...API_SERVER_ENV },
      { apiToken: 'test-secret', podNamespace: 'injected' }
    );

    await discovery.lookup('web', 1000);

    expect(discovery.podNamespace).toBe('injected');
    expect(stub.requests[0]?.url).toContain('/api/v1/namespaces/injected/pods');
    expect(stub.requests[0]?.headers.authorization).toBe('Bearer test-secret');
  });

  it('reads the credentials once, at construction', async () => {
    const { stub, discovery } = createDiscovery(() => podListResponse({ items: [] }));
    writeFileSync(join(dir, 'token'), 'rotated-token');

    await discovery.lookup('web', 1000);

    expect(stub.requests[0]?.headers.authorization).toBe('Bearer test-token');
  });

  it('fails without a request when the API server location is missing', async () => {
    const { stub, discovery } = createDiscovery(() => podListResponse({ items: [] }), {});

    const error = await captureRejection(discovery.lookup('web', 1000));

    expect(error).toBeInstanceOf(ConfigurationMissingError);
    expect(error).toMatchObject({
      message:
        'Unable to form request; check Kubernetes environment (expecting env vars KUBERNETES_SERVICE_HOST, KUBERNETES_SERVICE_PORT)',
      details: { envVars: ['KUBERNETES_SERVICE_HOST', 'KUBERNETES_SERVICE_PORT'] },
    });
    expect(stub.requests).toHaveLength(0);
  });

  it('picks up the API server location on each lookup', async () => {
    const env: EnvSource = {};
    const { stub, discovery } = createDiscovery(() => podListResponse({ items: [] }), env);

    await expect(discovery.lookup('web', 1000)).rejects.toBeInstanceOf(ConfigurationMissingError);

    env.KUBERNETES_SERVICE_HOST = '10.96.0.1';
    env.KUBERNETES_SERVICE_PORT = '443';
    await expect(discovery.lookup('web', 1000)).resolves.toEqual({ serviceName: 'web', addresses: [] });
    expect(stub.requests[0]?.url).toBe('https://10.96.0.1/api/v1/namespaces/team-a/pods?labelSelector=app%3Dweb');
  });

  it('warns with the available port names when pods exist but none match', async () => {
    const { discovery } = createDiscovery(() => podListResponse(createMockPodList(httpPod('10.1.2.3'))));

    await expect(discovery.lookup('web', 1000)).resolves.toEqual({ serviceName: 'web', addresses: [] });

    expect(logger.warn).toHaveBeenCalledWith(
      'No targets found from pod list. Is the correct port name configured? ' +
        'Current configuration: [management]. Ports on pods: [http, metrics]',
      { portName: 'management', portNames: ['http', 'metrics'], podCount: 1 }
    );
  });

  it('skips the port-name diagnostics when warnings are disabled', async () => {
    const { discovery } = createDiscovery(() => podListResponse(createMockPodList(httpPod('10.1.2.3'))));
    vi.mocked(logger.isWarnEnabled).mockReturnValueOnce(false);

    await expect(discovery.lookup('web', 1000)).resolves.toEqual({ serviceName: 'web', addresses: [] });

    expect(logger.warn).not.toHaveBeenCalledWith(expect.stringContaining('No targets found'), expect.anything());
  });

  it('returns an empty result without warning when no pods match the selector', async () => {
    const { discovery } = createDiscovery(() => podListResponse({ items: [] }));

    await expect(discovery.lookup('web', 1000)).resolves.toEqual({ serviceName: 'web', addresses: [] });

    expect(logger.warn).not.toHaveBeenCalledWith(expect.stringContaining('No targets found'), expect.anything());
  });

  it('propagates a forbidden response', async () => {
    const { discovery } = createDiscovery(() => ({ status: 403, body: '' }));
    await expect(discovery.lookup('web', 1000)).rejects.toBeInstanceOf(KubernetesApiForbiddenError);
  });

  it('propagates an invalid pod IP as an address resolution failure', async () => {
    const { discovery } = createDiscovery(() =>
      podListResponse(createMockPodList(createMockPod({ podIP: 'not-an-ip' })))
    );
    await expect(discovery.lookup('web', 1000)).rejects.toBeInstanceOf(AddressResolutionError);
  });

  it('times out a lookup the API server never answers', async () => {
    const { discovery } = createDiscovery(() => stalled());
    await expect(discovery.lookup('web', 20)).rejects.toBeInstanceOf(ResolutionTimeoutError);
  });

  it('reports transport errors as network failures', async () => {
    const { discovery } = createDiscovery(() => {
      throw new Error('socket hang up');
    });

    const error = await captureRejection(discovery.lookup('web', 1000));

    expect(error).toBeInstanceOf(NetworkFailureError);
    expect(error).toHaveProperty('message', 'Unable to communicate with Kubernetes API server: socket hang up');
  });

  it('serves concurrent lookups independently', async () => {
    const { stub, discovery } = createDiscovery(request =>
      request.url.endsWith('app%3Dweb')
        ? podListResponse(createMockPodList(createMockPod({ podIP: '10.1.2.3' })))
        : podListResponse(createMockPodList(createMockPod({ podIP: '10.1.2.9' })))
    );

    const [web, worker] = await Promise.all([discovery.lookup('web', 1000), discovery.lookup('worker', 1000)]);

    expect(web.addresses.map(target => target.host)).toEqual(['10-1-2-3.team-a.pod.cluster.local']);
    expect(worker.addresses.map(target => target.host)).toEqual(['10-1-2-9.team-a.pod.cluster.local']);
    expect(stub.requests).toHaveLength(2);
  });
});
