import type { Container, ContainerPort, Pod, PodList } from '@kube-discovery/core';

export function createMockPort(name: string | undefined, containerPort: number): ContainerPort {
  return name === undefined ? { containerPort } : { name, containerPort };
}

export function createMockContainer(ports: ContainerPort[], name = 'app'): Container {
  return { name, ports };
}

export interface MockPodOptions {
  name?: string;
  /** null leaves the pod without an IP */
  podIP?: string | null;
  deletionTimestamp?: string;
  containers?: Container[];
}

export function createMockPod(options: MockPodOptions = {}): Pod {
  return {
    metadata: {
      name: options.name ?? 'test-pod',
      ...(options.deletionTimestamp !== undefined && { deletionTimestamp: options.deletionTimestamp }),
    },
    spec: {
      containers: options.containers ?? [createMockContainer([createMockPort('management', 8558)])],
    },
    status: options.podIP === null ? {} : { podIP: options.podIP ?? '10.0.0.1' },
  };
}

export function createMockPodList(...pods: Pod[]): PodList {
  return { items: pods };
}
