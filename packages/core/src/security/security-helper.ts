/**
 * PHI encryption and masking for test fixtures
 *
 * - AES-256-GCM with a per-blob key derived (HKDF-SHA256) from the configured master key
 * - Blobs carry a fingerprint of the master key so a foreign key fails closed
 * - Key material is passed in explicitly, so several key domains can coexist
 *
 * @module @vitalcheck/core/security
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createHmac,
  hkdfSync,
  randomBytes,
  randomInt,
} from 'crypto';
import { encryptedBlob, type EncryptedBlob } from '@vitalcheck/types';
import { securityError, validationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { maskFields, maskSensitive } from './masking.js';

const logger: Logger = createLogger({ name: 'security-helper' });

const ENCRYPTION_CONFIG = {
  algorithm: 'aes-256-gcm' as const,
  keyLength: 32,
  ivLength: 12,
  authTagLength: 16,
  saltLength: 16,
  fingerprintLength: 8,
  version: 'v1',
};

const HEX_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
// Unpaired UTF-16 surrogates; UTF-8 encoding would replace them with U+FFFD
const LONE_SURROGATE = /\p{Cs}/u;

const PASSWORD_CLASSES = {
  lower: 'abcdefghijklmnopqrstuvwxyz',
  upper: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  digit: '0123456789',
  special: '!@#$%^&*',
};

export const MIN_PASSWORD_LENGTH = 8;

export interface SecurityHelperConfig {
  /** 32-byte master key as 64 hex characters */
  encryptionKey: string | undefined;
}

/**
 * Check if a key is weak (repeated patterns, all zeros, sequential bytes)
 */
export function isWeakKey(key: Buffer): boolean {
  if (key.every((byte) => byte === key[0])) {
    return true;
  }

  if (key.length >= 4) {
    let isRepeating = true;
    for (let i = 2; i < key.length; i++) {
      if (key[i] !== key[i - 2]) {
        isRepeating = false;
        break;
      }
    }
    if (isRepeating) return true;
  }

  let isSequential = true;
  for (let i = 1; i < key.length; i++) {
    if (key[i] !== ((key[i - 1] ?? 0) + 1) % 256) {
      isSequential = false;
      break;
    }
  }
  return isSequential;
}

function fingerprintOf(key: Buffer): string {
  return createHash('sha256')
    .update(key)
    .digest()
    .subarray(0, ENCRYPTION_CONFIG.fingerprintLength)
    .toString('hex');
}

function decodeBase64(part: string): Buffer | null {
  return BASE64_PATTERN.test(part) ? Buffer.from(part, 'base64') : null;
}

function pick(alphabet: string): string {
  return alphabet.charAt(randomInt(alphabet.length));
}

export class SecurityHelper {
  private readonly masterKey: Buffer;
  private readonly fingerprint: string;

  constructor(config: SecurityHelperConfig) {
    const keyHex = config.encryptionKey?.trim();
    if (!keyHex) {
      throw securityError('Encryption key is not configured', 'key_missing');
    }
    if (!HEX_KEY_PATTERN.test(keyHex)) {
      throw securityError(
        `Encryption key must be 32 bytes (64 hex characters), got ${keyHex.length} characters`,
        'key_malformed'
      );
    }

    const key = Buffer.from(keyHex, 'hex');
    if (isWeakKey(key)) {
      throw securityError(
        'Encryption key appears to be weak (repeated or sequential pattern)',
        'key_malformed'
      );
    }

    this.masterKey = key;
    this.fingerprint = fingerprintOf(key);
    logger.debug({ fingerprint: this.fingerprint }, 'Encryption key loaded and validated');
  }

  /**
   * Generate a fresh master key as 64 hex characters
   */
  static generateKey(): string {
    return randomBytes(ENCRYPTION_CONFIG.keyLength).toString('hex');
  }

  /** Fingerprint embedded in every blob produced under this key */
  get keyFingerprint(): string {
    return this.fingerprint;
  }

  /**
   * @throws ValidationError for text with unpaired surrogates, which would not decrypt to the same string
   */
  encrypt(plaintext: string | Buffer): EncryptedBlob {
    if (typeof plaintext === 'string' && LONE_SURROGATE.test(plaintext)) {
      throw validationError('Plaintext contains unpaired UTF-16 surrogates and cannot be encrypted losslessly');
    }
    const data = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf8') : plaintext;
    const salt = randomBytes(ENCRYPTION_CONFIG.saltLength);
    const iv = randomBytes(ENCRYPTION_CONFIG.ivLength);

    const cipher = createCipheriv(ENCRYPTION_CONFIG.algorithm, this.deriveKey(salt), iv, {
      authTagLength: ENCRYPTION_CONFIG.authTagLength,
    });
    const encrypted = Buffer.concat([cipher.update(data), cipher.final()]);
    const authTag = cipher.getAuthTag();

    // Format: version:fingerprint:salt:iv:authTag:ciphertext
    return encryptedBlob([
      ENCRYPTION_CONFIG.version,
      this.fingerprint,
      salt.toString('base64'),
      iv.toString('base64'),
      authTag.toString('base64'),
      encrypted.toString('base64'),
    ].join(':'));
  }

  /**
   * Decrypt a blob to UTF-8 text
   */
  decrypt(blob: string): string {
    return this.decryptToBuffer(blob).toString('utf8');
  }

  /**
   * Decrypt a blob to its exact original bytes
   */
  decryptToBuffer(blob: string): Buffer {
    const parts = blob.split(':');
    if (parts.length !== 6 || parts[0] !== ENCRYPTION_CONFIG.version) {
      throw securityError('Value is not an encrypted blob', 'blob_malformed');
    }

    const [, fingerprint = '', saltPart = '', ivPart = '', tagPart = '', dataPart = ''] = parts;
    if (fingerprint !== this.fingerprint) {
      throw securityError('Blob was encrypted under a different key', 'key_mismatch');
    }

    const salt = decodeBase64(saltPart);
    const iv = decodeBase64(ivPart);
    const authTag = decodeBase64(tagPart);
    const encrypted = decodeBase64(dataPart);
    if (
      salt?.length !== ENCRYPTION_CONFIG.saltLength ||
      iv?.length !== ENCRYPTION_CONFIG.ivLength ||
      authTag?.length !== ENCRYPTION_CONFIG.authTagLength ||
      encrypted === null
    ) {
      throw securityError('Encrypted blob is corrupted', 'blob_malformed');
    }

    try {
      const decipher = createDecipheriv(ENCRYPTION_CONFIG.algorithm, this.deriveKey(salt), iv, {
        authTagLength: ENCRYPTION_CONFIG.authTagLength,
      });
      decipher.setAuthTag(authTag);
      return Buffer.concat([decipher.update(encrypted), decipher.final()]);
    } catch (error) {
      throw securityError('Encrypted blob failed authentication', 'authentication_failed', error);
    }
  }

  /**
   * Redact sensitive substrings from text about to be logged or captured
   */
  mask(text: string): string {
    return maskSensitive(text);
  }

  maskFields(
    record: Readonly<Record<string, unknown>>,
    fields?: readonly string[]
  ): Record<string, unknown> {
    return maskFields(record, fields);
  }

  /**
   * Random password containing at least one lowercase, uppercase, digit and special character
   */
  generateSecurePassword(length = 16): string {
    if (!Number.isInteger(length) || length < MIN_PASSWORD_LENGTH) {
      throw validationError(`Password length must be an integer of at least ${MIN_PASSWORD_LENGTH}`);
    }

    const all = Object.values(PASSWORD_CLASSES).join('');
    const chars = Object.values(PASSWORD_CLASSES).map(pick);
    while (chars.length < length) {
      chars.push(pick(all));
    }

    // Fisher-Yates with a CSPRNG so the guaranteed characters are not always first
    for (let i = chars.length - 1; i > 0; i--) {
      const j = randomInt(i + 1);
      const current = chars[i] ?? '';
      chars[i] = chars[j] ?? '';
      chars[j] = current;
    }
    return chars.join('');
  }

  /**
   * 32 random bytes, base64url without padding
   */
  generateApiKey(): string {
    return randomBytes(32).toString('base64url');
  }

  /**
   * Deterministic keyed hash, for looking up encrypted values by equality
   */
  hashForIndex(value: string): string {
    return createHmac('sha256', this.masterKey).update(value, 'utf8').digest('hex');
  }

  private deriveKey(salt: Buffer): Buffer {
    return Buffer.from(
      hkdfSync('sha256', this.masterKey, salt, 'vitalcheck-phi', ENCRYPTION_CONFIG.keyLength)
    );
  }
}
