/**
 * Kubernetes API Client
 *
 * One GET per lookup against the pods endpoint. The body is always read as
 * text so that error responses can be logged verbatim; status classification
 * happens here rather than in axios.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type { Agent } from 'https';
import { bodyExcerpt, parsePodList, parseTextBody, type PodList } from '../contracts/pod-list.js';
import {
  KubernetesApiForbiddenError,
  NetworkFailureError,
  NonSuccessStatusError,
  ResolutionTimeoutError,
  errorMessage,
} from '../error-handling/errors.js';
import { getLogger } from '../logging/logger.js';
import type { PodRequest } from './request-builder.js';

const logger = getLogger('kubernetes-api-client');

export interface KubernetesApiClientOptions {
  httpsAgent?: Agent;
  /** Replaces the network transport; the test suites use it as an in-process API server. */
  adapter?: AxiosAdapter;
}

export class KubernetesApiClient {
  private readonly client: AxiosInstance;

  constructor(options: KubernetesApiClientOptions = {}) {
    this.client = axios.create({
      httpsAgent: options.httpsAgent,
      adapter: options.adapter,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      maxRedirects: 0,
      headers: { Accept: 'application/json' },
    });
  }

  async fetchPods(request: PodRequest, timeoutMs: number): Promise<PodList> {
    const response = await this.send(request, timeoutMs);
    return this.classify(request, response);
  }

  /**
   * The abort timer spans connect, headers and body, so a server that stalls
   * mid-body still fails at the deadline.
   */
  private async send(request: PodRequest, timeoutMs: number): Promise<AxiosResponse<unknown>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.client.get<unknown>(request.url, {
        headers: request.headers,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ResolutionTimeoutError(timeoutMs, error);
      }
      const code = axios.isAxiosError(error) ? error.code : undefined;
      throw new NetworkFailureError(
        `Unable to communicate with Kubernetes API server: ${errorMessage(error)}`,
        { url: request.url, code },
        error
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private classify(request: PodRequest, response: AxiosResponse<unknown>): PodList {
    const body = parseTextBody(response.data);

    switch (response.status) {
      case 200: {
        logger.debug('Kubernetes API entity received', { body });
        try {
          return parsePodList(body);
        } catch (error) {
          logger.warn('Failed to unmarshal Kubernetes API response', {
            status: response.status,
            body: bodyExcerpt(body),
            error: errorMessage(error),
          });
          throw error;
        }
      }
      case 403:
        logger.warn('Forbidden to communicate with Kubernetes API server; check RBAC settings', {
          body: bodyExcerpt(body),
        });
        throw new KubernetesApiForbiddenError({ url: request.url });
      default:
        logger.warn('Non-200 when communicating with Kubernetes API server', {
          status: response.status,
          body: bodyExcerpt(body),
        });
        throw new NonSuccessStatusError(response.status, { url: request.url });
    }
  }
}
