import { createHash } from 'node:crypto';

export const ADMIN_CONFIG_SEED = 'admin_config';
export const FORM_APPROVAL_SEED = 'form_approval';

/**
 * Storage address of an account: SHA-256 over the seeds followed by the
 * ledger namespace. Anyone holding the namespace can recompute it.
 */
export function deriveLedgerAddress(namespace: string, seeds: Array<string | Uint8Array>): string {
  const hash = createHash('sha256');
  for (const seed of seeds) {
    hash.update(typeof seed === 'string' ? Buffer.from(seed, 'utf8') : seed);
  }
  hash.update(Buffer.from(namespace.replace(/^0x/, ''), 'hex'));

  return `0x${hash.digest('hex')}`;
}

export function adminRegistryAddress(namespace: string): string {
  return deriveLedgerAddress(namespace, [ADMIN_CONFIG_SEED]);
}

export function approvalRecordAddress(namespace: string, documentId: string): string {
  return deriveLedgerAddress(namespace, [FORM_APPROVAL_SEED, documentId]);
}
