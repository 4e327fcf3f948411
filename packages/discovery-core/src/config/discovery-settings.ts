/**
 * Discovery Settings
 *
 * Every knob the Kubernetes API resolver reads. Defaults match a pod running
 * with a mounted service account; each value can be overridden from the
 * environment (KUBERNETES_DISCOVERY_*) or explicitly by the caller.
 */

import { z } from 'zod';
import { DiscoverySettingsError } from '../error-handling/errors.js';
import { getLogger } from '../logging/logger.js';
import { getOptionalConfig, parsePositiveInt, type EnvSource } from './environment-config.js';

const logger = getLogger('discovery-settings');

export const SERVICE_ACCOUNT_DIR = '/var/run/secrets/kubernetes.io/serviceaccount';

export const LABEL_SELECTOR_PLACEHOLDER = '%s';

export const discoverySettingsSchema = z.object({
  apiCaPath: z.string().min(1).default(`${SERVICE_ACCOUNT_DIR}/ca.crt`),
  apiTokenPath: z.string().min(1).default(`${SERVICE_ACCOUNT_DIR}/token`),
  apiServiceHostEnvName: z.string().min(1).default('KUBERNETES_SERVICE_HOST'),
  apiServicePortEnvName: z.string().min(1).default('KUBERNETES_SERVICE_PORT'),
  podNamespacePath: z.string().min(1).default(`${SERVICE_ACCOUNT_DIR}/namespace`),
  // Takes precedence over the namespace file when set
  podNamespace: z.string().min(1).optional(),
  defaultNamespace: z.string().min(1).default('default'),
  podDomain: z.string().min(1).default('cluster.local'),
  podLabelSelector: z.string().min(1).default(`app=${LABEL_SELECTOR_PLACEHOLDER}`),
  podPortName: z.string().min(1).default('management'),
  // Takes precedence over the token file when set
  apiToken: z.string().optional(),
  maxSockets: z.number().int().positive().default(20),
});

export type DiscoverySettings = Readonly<z.output<typeof discoverySettingsSchema>>;
export type DiscoverySettingsInput = z.input<typeof discoverySettingsSchema>;

export const SETTINGS_ENV_PREFIX = 'KUBERNETES_DISCOVERY_';

/**
 * Read the KUBERNETES_DISCOVERY_* overrides. Unset variables are left out so
 * schema defaults still apply.
 */
export function readSettingsFromEnv(env: EnvSource = process.env): DiscoverySettingsInput {
  const read = (name: string): string | undefined => getOptionalConfig(`${SETTINGS_ENV_PREFIX}${name}`, env);

  return {
    apiCaPath: read('API_CA_PATH'),
    apiTokenPath: read('API_TOKEN_PATH'),
    apiServiceHostEnvName: read('API_SERVICE_HOST_ENV_NAME'),
    apiServicePortEnvName: read('API_SERVICE_PORT_ENV_NAME'),
    podNamespacePath: read('POD_NAMESPACE_PATH'),
    podNamespace: read('POD_NAMESPACE'),
    defaultNamespace: read('DEFAULT_NAMESPACE'),
    podDomain: read('POD_DOMAIN'),
    podLabelSelector: read('POD_LABEL_SELECTOR'),
    podPortName: read('POD_PORT_NAME'),
    maxSockets: parsePositiveInt(`${SETTINGS_ENV_PREFIX}MAX_SOCKETS`, undefined, env),
  };
}

export function parseDiscoverySettings(input: DiscoverySettingsInput): DiscoverySettings {
  const result = discoverySettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new DiscoverySettingsError(issues.map(i => `${i.path}: ${i.message}`).join('; '), { issues });
  }
  return Object.freeze(result.data);
}

/**
 * Defaults, then environment overrides, then explicit overrides.
 */
export function loadDiscoverySettings(
  overrides: DiscoverySettingsInput = {},
  env: EnvSource = process.env
): DiscoverySettings {
  const fromEnv = readSettingsFromEnv(env);
  const merged: DiscoverySettingsInput = {
    apiCaPath: overrides.apiCaPath ?? fromEnv.apiCaPath,
    apiTokenPath: overrides.apiTokenPath ?? fromEnv.apiTokenPath,
    apiServiceHostEnvName: overrides.apiServiceHostEnvName ?? fromEnv.apiServiceHostEnvName,
    apiServicePortEnvName: overrides.apiServicePortEnvName ?? fromEnv.apiServicePortEnvName,
    podNamespacePath: overrides.podNamespacePath ?? fromEnv.podNamespacePath,
    podNamespace: overrides.podNamespace ?? fromEnv.podNamespace,
    defaultNamespace: overrides.defaultNamespace ?? fromEnv.defaultNamespace,
    podDomain: overrides.podDomain ?? fromEnv.podDomain,
    podLabelSelector: overrides.podLabelSelector ?? fromEnv.podLabelSelector,
    podPortName: overrides.podPortName ?? fromEnv.podPortName,
    apiToken: overrides.apiToken,
    maxSockets: overrides.maxSockets ?? fromEnv.maxSockets,
  };

  const settings = parseDiscoverySettings(merged);
  logger.debug('Discovery settings loaded', {
    podLabelSelector: settings.podLabelSelector,
    podPortName: settings.podPortName,
    podDomain: settings.podDomain,
    podNamespace: settings.podNamespace,
    apiServiceHostEnvName: settings.apiServiceHostEnvName,
    apiServicePortEnvName: settings.apiServicePortEnvName,
  });
  return settings;
}
