import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { errorMessage } from '../errors.js';

/** Default environment variable holding the secret encryption key. */
export const DEFAULT_KEY_ENV = 'VMKIT_SECRET_KEY';

const ENVELOPE_RE = /^v1:[A-Za-z0-9_-]+:[A-Za-z0-9_-]*:[A-Za-z0-9_-]+$/;

/**
 * Decode a base64url-encoded 32-byte key.
 *
 * @throws Error if the key is not exactly 32 bytes.
 */
export function parseSecretKey(keyB64Url: string): Buffer {
  const key = Buffer.from(keyB64Url.trim(), 'base64url');
  if (key.length !== 32) throw new Error('Secret key must be base64url encoded 32 bytes');
  return key;
}

/** Read the key from the environment; `null` when the variable is unset or blank. */
export function secretKeyFromEnv(varName: string = DEFAULT_KEY_ENV): Buffer | null {
  const raw = process.env[varName];
  if (raw === undefined || raw.trim() === '') return null;
  return parseSecretKey(raw);
}

/** A secret key read on first use; a malformed key only fails what needs it. */
export interface SecretKeyProvider {
  /** Whether a key is configured at all; it may still be malformed. */
  isSet(): boolean;
  /**
   * The parsed key, or `null` when none is configured.
   *
   * @throws Error if the configured key is malformed.
   */
  get(): Buffer | null;
}

/** Lazily read the key from `varName`, parsing it once. */
export function envSecretKey(varName: string = DEFAULT_KEY_ENV): SecretKeyProvider {
  let cached: Buffer | null | undefined;
  return {
    isSet: () => (process.env[varName] ?? '').trim() !== '',
    get: () => {
      if (cached === undefined) {
        try {
          cached = secretKeyFromEnv(varName);
        } catch (e: unknown) {
          throw new Error(`${varName}: ${errorMessage(e)}`);
        }
      }
      return cached;
    },
  };
}

/** Wrap a fixed key (or its absence) as a provider. */
export function toSecretKeyProvider(key: Buffer | null | SecretKeyProvider): SecretKeyProvider {
  if (key === null || Buffer.isBuffer(key)) {
    return { isSet: () => key !== null, get: () => key };
  }
  return key;
}

/** Whether `value` has the shape of an encoded secret. Does not verify it decrypts. */
export function isEncodedSecret(value: string): boolean {
  return ENVELOPE_RE.test(value);
}

/** Encrypt with AES-256-GCM into `v1:<nonce>:<ciphertext>:<tag>` (base64url parts). */
export function encodeSecret(plaintext: string, key: Buffer): string {
  const nonce = randomBytes(12);
  const cipher = createCipheriv('aes-256-gcm', key, nonce);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();

  return `v1:${nonce.toString('base64url')}:${ciphertext.toString('base64url')}:${tag.toString('base64url')}`;
}

/** @throws Error on a malformed envelope, wrong key or tampered ciphertext. */
export function decodeSecret(encoded: string, key: Buffer): string {
  const [v, nonceB64, cipherB64, tagB64] = encoded.split(':');
  if (v !== 'v1' || !nonceB64 || cipherB64 === undefined || !tagB64) {
    throw new Error('Invalid secret format');
  }

  const nonce = Buffer.from(nonceB64, 'base64url');
  const cipherBytes = Buffer.from(cipherB64, 'base64url');
  const tag = Buffer.from(tagB64, 'base64url');

  const decipher = createDecipheriv('aes-256-gcm', key, nonce);
  decipher.setAuthTag(tag);

  const plaintext = Buffer.concat([decipher.update(cipherBytes), decipher.final()]);
  return plaintext.toString('utf8');
}
