import { ConfigurationError } from '../config';
import { CredentialVault, ENCRYPTED_PREFIX } from '../utils/encryption';

const strictConfig = { mode: 'strict' as const, secret: 'test-secret', salt: 'dGVzdC1zYWx0' };

describe('CredentialVault', () => {
  let vault: CredentialVault;

  beforeEach(() => {
    vault = new CredentialVault(strictConfig);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should round-trip representative strings', () => {
    const samples = ['', 'test-token', 'Grüße, 世界 👋', 'x'.repeat(5000)];
    for (const sample of samples) {
      expect(vault.decrypt(vault.encrypt(sample))).toBe(sample);
    }
  });

  it('should tag every ciphertext with the vault prefix', () => {
    const encrypted = vault.encrypt('test-token');

    expect(encrypted.startsWith(ENCRYPTED_PREFIX)).toBe(true);
    expect(vault.isEncrypted(encrypted)).toBe(true);
    expect(vault.isEncrypted('test-token')).toBe(false);
  });

  it('should use a fresh IV for each encryption', () => {
    expect(vault.encrypt('test-token')).not.toBe(vault.encrypt('test-token'));
  });

  it('should return legacy plaintext unchanged on read', () => {
    expect(vault.decrypt('plain-legacy-token')).toBe('plain-legacy-token');
  });

  it('should report undecryptable values without throwing', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const encrypted = vault.encrypt('test-token');
    const tampered = `${encrypted.slice(0, -1)}${encrypted.endsWith('0') ? '1' : '0'}`;

    const result = vault.tryDecrypt(tampered);

    expect(result.ok).toBe(false);
    expect(vault.decrypt(tampered)).toBe(tampered);
  });

  it('should not decrypt with a different key', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const other = new CredentialVault({ ...strictConfig, secret: 'other-test-secret' });
    const encrypted = vault.encrypt('test-token');

    expect(other.tryDecrypt(encrypted).ok).toBe(false);
  });

  it('should reject malformed encrypted values', () => {
    const result = vault.tryDecrypt(`${ENCRYPTED_PREFIX}abc`);

    expect(result).toEqual({ ok: false, error: expect.any(Error) });
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid encrypted value format');
    }
  });

  it('should refuse to start in strict mode without key material', () => {
    expect(() => new CredentialVault({ mode: 'strict' })).toThrow(ConfigurationError);
    expect(() => new CredentialVault({ mode: 'strict', secret: 'test-secret' })).toThrow(ConfigurationError);
  });

  it('should fall back to the insecure development key with a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const devVault = new CredentialVault({ mode: 'dev-insecure' });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(devVault.decrypt(devVault.encrypt('test-token'))).toBe('test-token');
  });
});
