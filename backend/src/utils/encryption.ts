import crypto from 'crypto';
import { ConfigurationError, EncryptionConfig } from '../config';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const KEY_LENGTH = 32;
const PBKDF2_ITERATIONS = 100000;

/** Every value produced by the vault starts with this tag */
export const ENCRYPTED_PREFIX = 'enc:v1:';

const INSECURE_DEV_SECRET = 'insecure-dev-only-key-do-not-use-in-production!';
const INSECURE_DEV_SALT = Buffer.from('insecure-dev-salt').toString('base64');

export class DecryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecryptionError';
  }
}

export type DecryptResult =
  | { ok: true; value: string }
  | { ok: false; error: DecryptionError };

/**
 * Derive the 32-byte key once from the configured secret and salt.
 * Strict mode refuses to run without both.
 */
const deriveKey = (config: EncryptionConfig): Buffer => {
  let secret = config.secret;
  let salt = config.salt;

  if (!secret || !salt) {
    if (config.mode === 'strict') {
      throw new ConfigurationError(
        'ENCRYPTION_KEY and ENCRYPTION_SALT are required when ENCRYPTION_MODE is strict'
      );
    }
    console.warn('[vault] No encryption key/salt configured, using insecure development defaults');
    secret = secret || INSECURE_DEV_SECRET;
    salt = salt || INSECURE_DEV_SALT;
  }

  return crypto.pbkdf2Sync(
    secret,
    Buffer.from(salt, 'base64'),
    PBKDF2_ITERATIONS,
    KEY_LENGTH,
    'sha256'
  );
};

/**
 * Symmetric encryption of stored channel credentials.
 * Output format: enc:v1:<iv hex>:<auth tag hex>:<ciphertext hex>
 */
export class CredentialVault {
  private readonly key: Buffer;

  constructor(config: EncryptionConfig) {
    this.key = deriveKey(config);
  }

  isEncrypted(value: string): boolean {
    return value.startsWith(ENCRYPTED_PREFIX);
  }

  /**
   * Throws on failure; callers must never fall back to storing the plaintext.
   */
  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return `${ENCRYPTED_PREFIX}${iv.toString('hex')}:${tag.toString('hex')}:${encrypted.toString('hex')}`;
  }

  tryDecrypt(value: string): DecryptResult {
    if (!this.isEncrypted(value)) {
      return { ok: false, error: new DecryptionError('Value is not vault-encrypted') };
    }

    const parts = value.slice(ENCRYPTED_PREFIX.length).split(':');
    if (parts.length !== 3) {
      return { ok: false, error: new DecryptionError('Invalid encrypted value format') };
    }

    const [ivHex, tagHex, dataHex] = parts;
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(tagHex, 'hex'));
      const decrypted = Buffer.concat([
        decipher.update(Buffer.from(dataHex, 'hex')),
        decipher.final(),
      ]);
      return { ok: true, value: decrypted.toString('utf8') };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return { ok: false, error: new DecryptionError(`Failed to decrypt value: ${message}`) };
    }
  }

  /**
   * Read-path decryption: logs and returns the stored value unchanged when it cannot be
   * decrypted, so legacy plaintext keeps working and a broken value stays visible.
   */
  decrypt(value: string): string {
    if (!value) {
      return value;
    }

    const result = this.tryDecrypt(value);
    if (result.ok) {
      return result.value;
    }

    if (this.isEncrypted(value)) {
      console.error(`[vault] ${result.error.message}`);
    }
    return value;
  }
}
