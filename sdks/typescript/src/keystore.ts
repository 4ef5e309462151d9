/**
 * Key-store and trust-store loading.
 *
 * A store file is either PEM text or a PKCS#12 container. Loading tries PEM
 * first and falls back to PKCS#12 on any PEM failure. Each parser returns a
 * tagged result instead of throwing, so the fallback is a plain branch.
 */

import { createPrivateKey, X509Certificate, type KeyObject } from 'node:crypto';
import forge from 'node-forge';

/**
 * A private key with the certificate chain that identifies it.
 */
export interface KeyEntry {
  kind: 'key';
  alias: string;
  privateKey: KeyObject;
  /** Leaf certificate first */
  chain: X509Certificate[];
}

/**
 * A trusted certificate without a key.
 */
export interface CertificateEntry {
  kind: 'certificate';
  alias: string;
  certificate: X509Certificate;
}

export type KeyStoreEntry = KeyEntry | CertificateEntry;

/**
 * Loaded store contents.
 */
export interface KeyStore {
  format: 'pem' | 'pkcs12';

  /**
   * Whether a password protected the store itself. PEM files are never
   * protected as a whole; their password only decrypts the private key.
   */
  passwordProtected: boolean;

  entries: KeyStoreEntry[];
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;
const PRIVATE_KEY_BLOCK =
  /-----BEGIN (RSA |EC |ENCRYPTED )?PRIVATE KEY-----[\s\S]+?-----END \1?PRIVATE KEY-----/;

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function fail<T>(message: string, cause?: unknown): ParseResult<T> {
  return { ok: false, error: new Error(message, { cause }) };
}

/**
 * Read every certificate block from PEM text.
 */
export function readPemCertificates(text: string): X509Certificate[] {
  return (text.match(CERTIFICATE_BLOCK) ?? []).map((block) => new X509Certificate(block));
}

/**
 * Parse a PEM file holding a certificate chain and its private key.
 *
 * @param password - Decrypts the private key when it is encrypted
 */
export function parsePemKeyStore(data: Buffer, password?: string): ParseResult<KeyStore> {
  try {
    const text = data.toString('utf8');

    const chain = readPemCertificates(text);
    if (chain.length === 0) {
      return fail<KeyStore>('No certificate found in PEM key store');
    }

    const keyBlock = text.match(PRIVATE_KEY_BLOCK);
    if (!keyBlock) {
      return fail<KeyStore>('No private key found in PEM key store');
    }

    const privateKey = createPrivateKey({ key: keyBlock[0], format: 'pem', passphrase: password });
    if (!chain[0].checkPrivateKey(privateKey)) {
      return fail<KeyStore>('Private key does not match the first certificate in the PEM key store');
    }

    return ok<KeyStore>({
      format: 'pem',
      passwordProtected: false,
      entries: [{ kind: 'key', alias: 'key', privateKey, chain }],
    });
  } catch (err) {
    return fail<KeyStore>('Failed to parse PEM key store', err);
  }
}

/**
 * Parse a PEM file holding trusted certificates.
 */
export function parsePemTrustStore(data: Buffer): ParseResult<KeyStore> {
  try {
    const certificates = readPemCertificates(data.toString('utf8'));
    if (certificates.length === 0) {
      return fail<KeyStore>('No certificate found in PEM trust store');
    }

    return ok<KeyStore>({
      format: 'pem',
      passwordProtected: false,
      entries: certificates.map((certificate) => ({
        kind: 'certificate',
        alias: certificate.subject,
        certificate,
      })),
    });
  } catch (err) {
    return fail<KeyStore>('Failed to parse PEM trust store', err);
  }
}

function firstStringAttribute(bag: forge.pkcs12.Bag, name: string): string | undefined {
  const attributes: unknown = bag.attributes;
  if (typeof attributes !== 'object' || attributes === null) {
    return undefined;
  }
  const values: unknown = Reflect.get(attributes, name);
  if (Array.isArray(values) && typeof values[0] === 'string') {
    return values[0];
  }
  return undefined;
}

function derBytes(node: forge.asn1.Asn1): Buffer {
  return Buffer.from(forge.asn1.toDer(node).getBytes(), 'binary');
}

// forge only decodes RSA material; anything else is left as raw ASN.1.
function bagCertificate(bag: forge.pkcs12.Bag): X509Certificate | undefined {
  if (bag.cert) {
    return new X509Certificate(forge.pki.certificateToPem(bag.cert));
  }
  return bag.asn1 ? new X509Certificate(derBytes(bag.asn1)) : undefined;
}

function bagPrivateKey(bag: forge.pkcs12.Bag): KeyObject | undefined {
  if (bag.key) {
    return createPrivateKey(forge.pki.privateKeyToPem(bag.key));
  }
  return bag.asn1
    ? createPrivateKey({ key: derBytes(bag.asn1), format: 'der', type: 'pkcs8' })
    : undefined;
}

interface CertificateBag {
  bag: forge.pkcs12.Bag;
  certificate: X509Certificate;
}

/**
 * Parse a PKCS#12 container.
 *
 * Keys are paired with certificates through their local key ID, or with the
 * certificate that matches the key when the container has no key IDs.
 * Certificates not claimed by a key become certificate entries.
 */
export function parsePkcs12(data: Buffer, password?: string): ParseResult<KeyStore> {
  try {
    const der = forge.util.createBuffer(data.toString('binary'));
    const pfx = forge.pkcs12.pkcs12FromAsn1(forge.asn1.fromDer(der), password ?? '');

    const keyBags = [
      ...(pfx.getBags({ bagType: forge.pki.oids.pkcs8ShroudedKeyBag })[forge.pki.oids.pkcs8ShroudedKeyBag] ?? []),
      ...(pfx.getBags({ bagType: forge.pki.oids.keyBag })[forge.pki.oids.keyBag] ?? []),
    ];
    const certificates: CertificateBag[] = [];
    for (const bag of pfx.getBags({ bagType: forge.pki.oids.certBag })[forge.pki.oids.certBag] ?? []) {
      const certificate = bagCertificate(bag);
      if (certificate) {
        certificates.push({ bag, certificate });
      }
    }

    const claimed = new Set<CertificateBag>();
    const entries: KeyStoreEntry[] = [];

    keyBags.forEach((keyBag, i) => {
      const privateKey = bagPrivateKey(keyBag);
      if (!privateKey) {
        return;
      }

      const keyId = firstStringAttribute(keyBag, 'localKeyId');
      const byKeyId = keyId === undefined
        ? []
        : certificates.filter((candidate) => firstStringAttribute(candidate.bag, 'localKeyId') === keyId);
      const matching = byKeyId.length > 0
        ? byKeyId
        : certificates.filter(
            (candidate) => !claimed.has(candidate) && candidate.certificate.checkPrivateKey(privateKey)
          );
      if (matching.length === 0) {
        throw new Error(`PKCS#12 key entry ${i} has no certificate`);
      }
      matching.forEach((candidate) => claimed.add(candidate));

      entries.push({
        kind: 'key',
        alias: firstStringAttribute(keyBag, 'friendlyName') ?? `key-${i}`,
        privateKey,
        chain: matching.map((candidate) => candidate.certificate),
      });
    });

    certificates.forEach((candidate, i) => {
      if (!claimed.has(candidate)) {
        entries.push({
          kind: 'certificate',
          alias: firstStringAttribute(candidate.bag, 'friendlyName') ?? `certificate-${i}`,
          certificate: candidate.certificate,
        });
      }
    });

    if (entries.length === 0) {
      return fail<KeyStore>('PKCS#12 container holds no keys or certificates');
    }

    return ok<KeyStore>({ format: 'pkcs12', passwordProtected: password !== undefined, entries });
  } catch (err) {
    return fail<KeyStore>('Failed to parse PKCS#12 container', err);
  }
}

/**
 * Load a key store: PEM first, PKCS#12 when PEM parsing fails for any reason.
 *
 * @throws Error when neither format parses
 */
export function loadKeyStore(data: Buffer, password?: string): KeyStore {
  const pem = parsePemKeyStore(data, password);
  if (pem.ok) {
    return pem.value;
  }

  const pkcs12 = parsePkcs12(data, password);
  if (pkcs12.ok) {
    return pkcs12.value;
  }
  throw pkcs12.error;
}

/**
 * Load a trust store: PEM certificates first, PKCS#12 when PEM yields none.
 *
 * @throws Error when neither format parses
 */
export function loadTrustStore(data: Buffer, password?: string): KeyStore {
  const pem = parsePemTrustStore(data);
  if (pem.ok) {
    return pem.value;
  }

  const pkcs12 = parsePkcs12(data, password);
  if (pkcs12.ok) {
    return pkcs12.value;
  }
  throw pkcs12.error;
}
