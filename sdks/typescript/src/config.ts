/**
 * Configuration defaults and validation.
 */

import { InvalidArgumentError } from '@shardscroll/client/errors';
import { DEFAULT_RETRY_CONFIG } from '@shardscroll/client/retry';
import type { ElasticsearchConfig, Logger, RetryConfig } from '@shardscroll/client/types';

/**
 * Configuration with every default applied.
 */
export interface ResolvedConfig {
  host: string;
  port: number;
  tlsEnabled: boolean;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  maxRetryTimeMs: number;
  scrollSize: number;
  scrollTimeoutMs: number;
  verifyHostnames: boolean;
  keystorePath?: string;
  keystorePassword?: string;
  truststorePath?: string;
  truststorePassword?: string;
  retry: Required<RetryConfig>;
  logger: Logger;
}

export const DEFAULT_CONFIG = {
  port: 9200,
  tlsEnabled: false,
  connectTimeoutMs: 1000,
  requestTimeoutMs: 10000,
  maxRetryTimeMs: 20000,
  scrollSize: 1000,
  scrollTimeoutMs: 60000,
  verifyHostnames: true,
} as const;

const requirePositiveInteger = (name: string, value: number): number => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer. Received: ${value}`);
  }
  return value;
};

const requireNonNegativeInteger = (name: string, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer. Received: ${value}`);
  }
  return value;
};

/**
 * Apply defaults and validate a client configuration.
 *
 * @throws InvalidArgumentError if a value is out of range
 */
export function resolveConfig(config: ElasticsearchConfig): ResolvedConfig {
  const host = typeof config.host === 'string' ? config.host.trim() : '';
  if (host === '') {
    throw new InvalidArgumentError('host is required');
  }

  const port = config.port ?? DEFAULT_CONFIG.port;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`port=${port} is out of allowed range [1..65535]`);
  }

  if (config.keystorePassword !== undefined && config.keystorePath === undefined) {
    throw new InvalidArgumentError('keystorePassword requires keystorePath');
  }
  if (config.truststorePassword !== undefined && config.truststorePath === undefined) {
    throw new InvalidArgumentError('truststorePassword requires truststorePath');
  }

  const retry: Required<RetryConfig> = {
    ...DEFAULT_RETRY_CONFIG,
    ...config.retry,
  };
  requireNonNegativeInteger('retry.initialDelayMs', retry.initialDelayMs);
  requireNonNegativeInteger('retry.maxDelayMs', retry.maxDelayMs);
  requireNonNegativeInteger('retry.jitterMs', retry.jitterMs);
  if (!(retry.backoffMultiplier >= 1)) {
    throw new InvalidArgumentError(`retry.backoffMultiplier must be >= 1. Received: ${retry.backoffMultiplier}`);
  }

  return {
    host,
    port,
    tlsEnabled: config.tlsEnabled ?? DEFAULT_CONFIG.tlsEnabled,
    connectTimeoutMs: requirePositiveInteger('connectTimeoutMs', config.connectTimeoutMs ?? DEFAULT_CONFIG.connectTimeoutMs),
    requestTimeoutMs: requirePositiveInteger('requestTimeoutMs', config.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs),
    maxRetryTimeMs: requireNonNegativeInteger('maxRetryTimeMs', config.maxRetryTimeMs ?? DEFAULT_CONFIG.maxRetryTimeMs),
    scrollSize: requirePositiveInteger('scrollSize', config.scrollSize ?? DEFAULT_CONFIG.scrollSize),
    scrollTimeoutMs: requirePositiveInteger('scrollTimeoutMs', config.scrollTimeoutMs ?? DEFAULT_CONFIG.scrollTimeoutMs),
    verifyHostnames: config.verifyHostnames ?? DEFAULT_CONFIG.verifyHostnames,
    keystorePath: config.keystorePath,
    keystorePassword: config.keystorePassword,
    truststorePath: config.truststorePath,
    truststorePassword: config.truststorePassword,
    retry,
    logger: config.logger ?? console,
  };
}

/**
 * URL scheme used for every cluster node.
 */
export function schemeFor(config: Pick<ResolvedConfig, 'tlsEnabled'>): 'http' | 'https' {
  return config.tlsEnabled ? 'https' : 'http';
}
