import { encryptStoredCredentials } from '../scripts/encryptCredentials';
import { CredentialVault } from '../utils/encryption';
import { InMemoryAccountRepository, buildAccount } from './helpers/inMemoryRepositories';

describe('encryptStoredCredentials', () => {
  let accounts: InMemoryAccountRepository;
  let vault: CredentialVault;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    accounts = new InMemoryAccountRepository();
    vault = new CredentialVault({ mode: 'strict', secret: 'test-secret', salt: 'dGVzdC1zYWx0' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should encrypt plaintext credentials and leave encrypted ones alone', async () => {
    const plain = accounts.add(buildAccount({ accessToken: 'test-token', appSecret: 'test-secret' }));
    const alreadyEncrypted = vault.encrypt('other-token');
    const partial = accounts.add(buildAccount({ accessToken: alreadyEncrypted, appSecret: 'test-secret' }));
    const empty = accounts.add(buildAccount({ accessToken: '', appSecret: '' }));

    const summary = await encryptStoredCredentials(accounts, vault);

    expect(summary).toEqual({ scanned: 3, updated: 2 });

    const storedPlain = accounts.get(plain.id);
    expect(vault.isEncrypted(storedPlain.accessToken)).toBe(true);
    expect(vault.decrypt(storedPlain.accessToken)).toBe('test-token');
    expect(vault.decrypt(storedPlain.appSecret)).toBe('test-secret');

    const storedPartial = accounts.get(partial.id);
    expect(storedPartial.accessToken).toBe(alreadyEncrypted);
    expect(vault.decrypt(storedPartial.appSecret)).toBe('test-secret');

    expect(accounts.get(empty.id)).toMatchObject({ accessToken: '', appSecret: '' });
  });

  it('should change nothing on a second run', async () => {
    accounts.add(buildAccount());
    await encryptStoredCredentials(accounts, vault);

    expect(await encryptStoredCredentials(accounts, vault)).toEqual({ scanned: 1, updated: 0 });
  });
});
