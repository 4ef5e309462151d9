/**
 * Custom error classes for the shardscroll client.
 */

interface ErrorOptions {
  cause?: unknown;
}

/**
 * Base error class for all client errors.
 */
export class ShardScrollError extends Error {
  constructor(message: string, public readonly code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ShardScrollError';
    Object.setPrototypeOf(this, ShardScrollError.prototype);
  }
}

/**
 * Transport-level failure: I/O error, unreachable host, timeout or an HTTP
 * error status without a structured query failure in it.
 */
export class ConnectionError extends ShardScrollError {
  constructor(message: string, public readonly address?: string, options?: ErrorOptions) {
    super(message, 'CONNECTION_ERROR', options);
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * A payload was received but does not have the expected shape.
 */
export class InvalidResponseError extends ShardScrollError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_RESPONSE', options);
    this.name = 'InvalidResponseError';
    Object.setPrototypeOf(this, InvalidResponseError.prototype);
  }
}

/**
 * The cluster rejected the query itself (malformed query, type mismatch, ...).
 * The message is the reason reported by the cluster.
 */
export class QueryFailureError extends ShardScrollError {
  constructor(
    /** Human-readable reason from the cluster's error body */
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(reason, 'QUERY_FAILURE', options);
    this.name = 'QueryFailureError';
    Object.setPrototypeOf(this, QueryFailureError.prototype);
  }
}

/**
 * Building the TLS context failed.
 */
export class SslInitializationError extends ShardScrollError {
  constructor(message: string, options?: ErrorOptions, code: string = 'SSL_INITIALIZATION_FAILURE') {
    super(message, code, options);
    this.name = 'SslInitializationError';
    Object.setPrototypeOf(this, SslInitializationError.prototype);
  }
}

/**
 * Which validity check a key-store certificate failed.
 */
export type CertificateCheck = 'expired' | 'not-yet-valid';

/**
 * A key-store certificate is outside its validity window.
 */
export class CertificateValidityError extends SslInitializationError {
  constructor(
    message: string,
    public readonly check: CertificateCheck,
    /** Subject of the offending certificate */
    public readonly subject: string
  ) {
    super(message, undefined, 'CERTIFICATE_VALIDITY');
    this.name = 'CertificateValidityError';
    Object.setPrototypeOf(this, CertificateValidityError.prototype);
  }
}

/**
 * Error indicating invalid configuration or call arguments.
 */
export class InvalidArgumentError extends ShardScrollError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Error indicating no data nodes are known.
 */
export class NoNodesAvailableError extends ShardScrollError {
  constructor(message: string = 'No data nodes available in the cluster') {
    super(message, 'NO_NODES_AVAILABLE');
    this.name = 'NoNodesAvailableError';
    Object.setPrototypeOf(this, NoNodesAvailableError.prototype);
  }
}

/**
 * Error indicating the retry-time budget was spent.
 */
export class RetryExhaustedError extends ShardScrollError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError?: Error
  ) {
    super(message, 'RETRY_EXHAUSTED', { cause: lastError });
    this.name = 'RetryExhaustedError';
    Object.setPrototypeOf(this, RetryExhaustedError.prototype);
  }
}

/**
 * Error indicating an object was used in the wrong lifecycle state
 * (client not connected, client closed, scroll already cleared).
 */
export class ClientStateError extends ShardScrollError {
  constructor(message: string) {
    super(message, 'CLIENT_STATE');
    this.name = 'ClientStateError';
    Object.setPrototypeOf(this, ClientStateError.prototype);
  }
}
