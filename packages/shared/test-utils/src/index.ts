export { createMockLogger, type MockLogger } from './logger-mock.js';

export { createMockPort, createMockContainer, createMockPod, createMockPodList, type MockPodOptions } from './pod-factories.js';

export {
  createKubernetesApiStub,
  podListResponse,
  connectionRefused,
  stalled,
  type KubernetesApiStub,
  type RecordedRequest,
  type StubHandler,
  type StubResponse,
} from './kubernetes-api-stub.js';

export { captureRejection, captureError } from './async-helpers.js';
