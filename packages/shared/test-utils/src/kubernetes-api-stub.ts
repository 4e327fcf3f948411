import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  url: string;
  method: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
}

export interface StubResponse {
  status: number;
  body?: unknown;
}

export type StubHandler = (request: RecordedRequest) => StubResponse | Promise<StubResponse>;

export interface KubernetesApiStub {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
}

function toHeaderRecord(config: InternalAxiosRequestConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(config.headers.toJSON())) {
    if (typeof value === 'string') headers[key.toLowerCase()] = value;
  }
  return headers;
}

function rejectOnAbort(config: InternalAxiosRequestConfig): Promise<never> {
  return new Promise((_, reject) => {
    const signal = config.signal;
    if (!signal) return;
    const abort = () => reject(new AxiosError('stub request aborted', AxiosError.ERR_CANCELED, config));
    if (signal.aborted) {
      abort();
      return;
    }
    signal.addEventListener?.('abort', abort);
  });
}

/**
 * In-process stand-in for the API server, plugged into axios as its adapter.
 * Handlers that never settle simulate a stalled server; the request then ends
 * only when the caller aborts it.
 */
export function createKubernetesApiStub(handler: StubHandler): KubernetesApiStub {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async config => {
    const request: RecordedRequest = {
      url: config.url ?? '',
      method: (config.method ?? 'get').toUpperCase(),
      headers: toHeaderRecord(config),
    };
    requests.push(request);

    const result = await Promise.race([Promise.resolve().then(() => handler(request)), rejectOnAbort(config)]);

    const response: AxiosResponse = {
      data: result.body,
      status: result.status,
      statusText: String(result.status),
      headers: {},
      config,
    };
    return response;
  };

  return { adapter, requests };
}

export function podListResponse(body: unknown): StubResponse {
  return { status: 200, body: typeof body === 'string' ? body : JSON.stringify(body) };
}

export function connectionRefused(): never {
  throw new AxiosError('connect ECONNREFUSED 10.96.0.1:443', 'ECONNREFUSED');
}

export function stalled(): Promise<never> {
  return new Promise<never>(() => undefined);
}
