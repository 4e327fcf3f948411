/**
 * Pod List Contract
 *
 * The subset of the Kubernetes `v1.PodList` resource the resolver reads.
 * Everything below the item list is optional; unknown fields are dropped.
 */

import { z } from 'zod';
import { UnmarshalFailureError, errorMessage } from '../error-handling/errors.js';

export const BODY_EXCERPT_LIMIT = 512;

export const containerPortSchema = z.object({
  name: z.string().nullish(),
  containerPort: z.number().int(),
});

export const containerSchema = z.object({
  name: z.string().nullish(),
  ports: z.array(containerPortSchema).nullish(),
});

export const podMetadataSchema = z.object({
  name: z.string().nullish(),
  deletionTimestamp: z.string().nullish(),
});

export const podSpecSchema = z.object({
  containers: z
    .array(containerSchema)
    .nullish()
    .transform(containers => containers ?? []),
});

export const podStatusSchema = z.object({
  podIP: z.string().nullish(),
});

export const podSchema = z.object({
  metadata: podMetadataSchema.nullish(),
  spec: podSpecSchema.nullish(),
  status: podStatusSchema.nullish(),
});

export const podListSchema = z.object({
  items: z
    .array(podSchema)
    .nullish()
    .transform(items => items ?? []),
});

export type ContainerPort = z.output<typeof containerPortSchema>;
export type Container = z.output<typeof containerSchema>;
export type Pod = z.output<typeof podSchema>;
export type PodList = z.output<typeof podListSchema>;
export type PodListInput = z.input<typeof podListSchema>;

export function bodyExcerpt(body: string, limit = BODY_EXCERPT_LIMIT): string {
  return body.length > limit ? `${body.slice(0, limit)}...` : body;
}

/**
 * Decode a 200 response body into a PodList.
 */
export function parsePodList(body: string): PodList {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new UnmarshalFailureError(`malformed JSON (${errorMessage(error)})`, bodyExcerpt(body), undefined, error);
  }

  const result = podListSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));
    throw new UnmarshalFailureError(
      `document does not match PodList (${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')})`,
      bodyExcerpt(body),
      { issues }
    );
  }

  return result.data;
}

/**
 * Decode a body for diagnostics only.
 */
export function parseTextBody(body: unknown): string {
  if (typeof body === 'string') return body;
  if (body === undefined || body === null) return '';
  if (Buffer.isBuffer(body)) return body.toString('utf-8');
  if (body instanceof ArrayBuffer) return Buffer.from(body).toString('utf-8');
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}
