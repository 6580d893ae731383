import { timingSafeEqual } from 'node:crypto';

import { isAdmin } from '../admins/admin-registry';
import { LedgerError, LedgerErrorCode } from '../common/ledger-error';
import type { AdminRegistry, ApprovalRecord } from '../ledger/ledger.types';

export const MAX_FORM_ID_LENGTH = 64;
export const MAX_METADATA_LENGTH = 256;
export const FORM_HASH_LENGTH = 32;

export interface FormSubmission {
  documentId: string;
  documentHash: string;
  metadata?: string;
}

function byteLength(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}

const FORM_HASH_PATTERN = /^(0x)?[0-9a-fA-F]{64}$/;

/** Decodes a 32-byte hex digest; anything else yields an empty buffer. */
export function hashToBytes(hash: string): Buffer {
  if (!FORM_HASH_PATTERN.test(hash)) {
    return Buffer.alloc(0);
  }

  return Buffer.from(hash.replace(/^0x/i, ''), 'hex');
}

export function isValidFormHash(hash: string): boolean {
  const bytes = hashToBytes(hash);
  return bytes.length === FORM_HASH_LENGTH && bytes.some((byte) => byte !== 0);
}

function assertMetadata(metadata: string) {
  if (byteLength(metadata) > MAX_METADATA_LENGTH) {
    throw new LedgerError(LedgerErrorCode.MetadataTooLong);
  }
}

/**
 * Builds the record for a first approval. The caller must persist it with an
 * insert-if-absent write at the document's derived address.
 */
export function signFormSubmission(
  registry: AdminRegistry | undefined,
  caller: string,
  submission: FormSubmission,
  approvedAt: number,
): ApprovalRecord {
  if (!submission.documentId) {
    throw new LedgerError(LedgerErrorCode.InvalidFormId);
  }

  if (byteLength(submission.documentId) > MAX_FORM_ID_LENGTH) {
    throw new LedgerError(LedgerErrorCode.FormIdTooLong);
  }

  if (!isValidFormHash(submission.documentHash)) {
    throw new LedgerError(LedgerErrorCode.InvalidFormHash);
  }

  if (!registry) {
    throw new LedgerError(LedgerErrorCode.AdminRegistryNotInitialized);
  }

  if (!isAdmin(registry, caller)) {
    throw new LedgerError(LedgerErrorCode.UnauthorizedAdmin);
  }

  if (submission.metadata !== undefined) {
    assertMetadata(submission.metadata);
  }

  return {
    documentId: submission.documentId,
    documentHash: `0x${hashToBytes(submission.documentHash).toString('hex')}`,
    signer: caller,
    approvedAt,
    metadata: submission.metadata ?? '',
  };
}

/** Only the original signer, while still an admin, may rewrite the metadata. */
export function updateFormApproval(
  record: ApprovalRecord | undefined,
  registry: AdminRegistry | undefined,
  caller: string,
  metadata: string,
): ApprovalRecord {
  if (!record) {
    throw new LedgerError(LedgerErrorCode.RecordNotFound);
  }

  if (record.signer !== caller || !registry || !isAdmin(registry, caller)) {
    throw new LedgerError(LedgerErrorCode.UnauthorizedAdmin);
  }

  assertMetadata(metadata);

  return { ...record, metadata };
}

export function verifyFormApproval(record: ApprovalRecord | undefined, expectedHash: string): boolean {
  if (!record) {
    throw new LedgerError(LedgerErrorCode.RecordNotFound);
  }

  const expected = hashToBytes(expectedHash);
  if (expected.length !== FORM_HASH_LENGTH) {
    return false;
  }

  return timingSafeEqual(hashToBytes(record.documentHash), expected);
}
