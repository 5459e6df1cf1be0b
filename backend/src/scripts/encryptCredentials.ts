import { AccountRepository } from '../db/repositories';
import { CredentialVault } from '../utils/encryption';

export interface EncryptionSummary {
  scanned: number;
  updated: number;
}

/**
 * Encrypt every stored access token and app secret still held as plaintext.
 * Values already carrying the vault prefix are left alone, so reruns are no-ops.
 */
export const encryptStoredCredentials = async (
  accounts: AccountRepository,
  vault: CredentialVault
): Promise<EncryptionSummary> => {
  const all = await accounts.listAll();
  let updated = 0;

  for (const account of all) {
    const needsToken = account.accessToken !== '' && !vault.isEncrypted(account.accessToken);
    const needsSecret = account.appSecret !== '' && !vault.isEncrypted(account.appSecret);
    if (!needsToken && !needsSecret) {
      continue;
    }

    await accounts.updateCredentials(account.id, {
      accessToken: needsToken ? vault.encrypt(account.accessToken) : account.accessToken,
      appSecret: needsSecret ? vault.encrypt(account.appSecret) : account.appSecret,
    });
    updated++;
    console.log(`[encrypt-credentials] Encrypted credentials of account ${account.id}`);
  }

  return { scanned: all.length, updated };
};

if (require.main === module) {
  Promise.all([import('../config'), import('../config/database'), import('../db')])
    .then(async ([{ getConfig }, { default: pool }, { createPgRepositories }]) => {
      try {
        const vault = new CredentialVault(getConfig().encryption);
        const summary = await encryptStoredCredentials(createPgRepositories(pool).accounts, vault);
        console.log(`[encrypt-credentials] ${summary.updated} of ${summary.scanned} account(s) updated`);
      } finally {
        await pool.end();
      }
    })
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('[encrypt-credentials] Failed:', error);
      process.exit(1);
    });
}
