/**
 * Credential Loader
 *
 * Reads the service-account token and namespace once, at construction.
 * Uses blocking I/O, so nothing here may run on the lookup path.
 */

import { existsSync, readFileSync } from 'fs';
import type { DiscoverySettings } from '../config/discovery-settings.js';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

const logger = getLogger('credential-loader');

export interface DiscoveryCredentials {
  readonly apiToken: string;
  readonly podNamespace: string;
}

/**
 * Read a file as UTF-8 text. Missing or unreadable files yield undefined.
 */
export function readValue(path: string, name: string): string | undefined {
  if (!existsSync(path)) {
    logger.warn(`Unable to read ${name} from ${path} because it doesn't exist.`, { name, path });
    return undefined;
  }

  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    logger.error(`Error reading ${name} from ${path}`, { name, path, error: serializeError(error) });
    return undefined;
  }
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadCredentials(settings: DiscoverySettings): DiscoveryCredentials {
  const apiToken = settings.apiToken ?? nonBlank(readValue(settings.apiTokenPath, 'api-token')) ?? '';

  const podNamespace =
    settings.podNamespace ??
    nonBlank(readValue(settings.podNamespacePath, 'pod-namespace')) ??
    settings.defaultNamespace;

  return Object.freeze({ apiToken, podNamespace });
}
