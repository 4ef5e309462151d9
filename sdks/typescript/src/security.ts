/**
 * TLS context construction from key-store and trust-store files.
 *
 * The key store identifies this client (mutual TLS); the trust store holds
 * the anchors used to verify cluster nodes. Without a trust store the key
 * store doubles as one.
 */

import { readFileSync } from 'node:fs';
import type { X509Certificate } from 'node:crypto';
import { createSecureContext, type ConnectionOptions } from 'node:tls';
import { CertificateValidityError, SslInitializationError } from '@shardscroll/client/errors';
import { loadKeyStore, loadTrustStore, type KeyStore } from '@shardscroll/client/keystore';

/**
 * Key-store and trust-store locations.
 */
export interface SecurityMaterial {
  keystorePath?: string;
  keystorePassword?: string;
  truststorePath?: string;
  truststorePassword?: string;
}

/**
 * Client identity presented during the handshake.
 */
export interface KeyManager {
  alias: string;
  /** Unencrypted PKCS#8 private key */
  privateKeyPem: string;
  /** Leaf certificate followed by its chain */
  certificateChainPem: string;
}

/**
 * Verifies server certificates against a set of anchors.
 */
export interface X509TrustManager {
  anchors: X509Certificate[];
}

/**
 * Fully initialized TLS context.
 */
export interface TlsContext {
  keyManagers: KeyManager[];
  trustManager: X509TrustManager;
  /** Options to hand to a TLS client connection */
  connectionOptions: ConnectionOptions;
}

export interface SecurityContextOptions {
  now?: () => Date;
  readFile?: (path: string) => Buffer;
}

/**
 * Check that the certificate of every key entry is currently valid.
 *
 * Only the leaf is checked; the rest of the chain and certificate entries
 * are anchors and are not.
 *
 * @throws CertificateValidityError naming the failed check
 */
export function validateCertificates(store: KeyStore, now: Date): void {
  for (const entry of store.entries) {
    if (entry.kind !== 'key') {
      continue;
    }

    const [certificate] = entry.chain;
    const notBefore = new Date(certificate.validFrom);
    const notAfter = new Date(certificate.validTo);
    if (Number.isNaN(notBefore.getTime()) || Number.isNaN(notAfter.getTime())) {
      throw new Error(`Unreadable validity period on certificate ${certificate.subject}`);
    }

    if (now.getTime() > notAfter.getTime()) {
      throw new CertificateValidityError(
        `KeyStore certificate is expired: ${certificate.subject} (not after ${certificate.validTo})`,
        'expired',
        certificate.subject
      );
    }
    if (now.getTime() < notBefore.getTime()) {
      throw new CertificateValidityError(
        `KeyStore certificate is not yet valid: ${certificate.subject} (not before ${certificate.validFrom})`,
        'not-yet-valid',
        certificate.subject
      );
    }
  }
}

/**
 * One key manager per key entry.
 */
export function buildKeyManagers(store: KeyStore): KeyManager[] {
  const keyManagers: KeyManager[] = [];

  for (const entry of store.entries) {
    if (entry.kind === 'key') {
      keyManagers.push({
        alias: entry.alias,
        privateKeyPem: entry.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
        certificateChainPem: entry.chain.map((certificate) => certificate.toString()).join('\n'),
      });
    }
  }

  return keyManagers;
}

/**
 * Trust managers for a store: one covering all anchors, or none when the
 * store has no anchors.
 *
 * Anchors are the certificate entries plus the leaf of every key entry.
 */
export function deriveTrustManagers(store: KeyStore): X509TrustManager[] {
  const anchors = store.entries.map((entry) =>
    entry.kind === 'certificate' ? entry.certificate : entry.chain[0]
  );

  return anchors.length === 0 ? [] : [{ anchors }];
}

/**
 * Build a TLS context from the configured stores.
 *
 * @returns undefined when neither a key store nor a trust store is configured
 * @throws CertificateValidityError when a key-store certificate is outside its validity window
 * @throws SslInitializationError for any other I/O or crypto failure
 */
export function buildTlsContext(
  material: SecurityMaterial,
  options: SecurityContextOptions = {}
): TlsContext | undefined {
  if (material.keystorePath === undefined && material.truststorePath === undefined) {
    return undefined;
  }

  const now = options.now ?? (() => new Date());
  const readFile = options.readFile ?? ((path: string) => readFileSync(path));

  try {
    let keyStore: KeyStore | undefined;
    let keyManagers: KeyManager[] = [];
    if (material.keystorePath !== undefined) {
      keyStore = loadKeyStore(readFile(material.keystorePath), material.keystorePassword);
      validateCertificates(keyStore, now());
      keyManagers = buildKeyManagers(keyStore);
    }

    const trustStore = material.truststorePath !== undefined
      ? loadTrustStore(readFile(material.truststorePath), material.truststorePassword)
      : keyStore;
    if (trustStore === undefined) {
      throw new Error('No trust store available');
    }

    const trustManagers = deriveTrustManagers(trustStore);
    if (trustManagers.length !== 1) {
      throw new Error(`Expected exactly one X.509 trust manager, found ${trustManagers.length}`);
    }
    const [trustManager] = trustManagers;

    const connectionOptions: ConnectionOptions = {
      ca: trustManager.anchors.map((certificate) => certificate.toString()),
    };
    if (keyManagers.length > 0) {
      connectionOptions.key = keyManagers.map((keyManager) => keyManager.privateKeyPem);
      connectionOptions.cert = keyManagers.map((keyManager) => keyManager.certificateChainPem);
    }

    // Fails on key material the TLS stack cannot use
    createSecureContext(connectionOptions);

    return { keyManagers, trustManager, connectionOptions };
  } catch (err) {
    if (err instanceof SslInitializationError) {
      throw err;
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new SslInitializationError(`Failed to initialize TLS context: ${detail}`, { cause: err });
  }
}
