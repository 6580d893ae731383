import type { ApprovalRecord } from '../ledger/ledger.types';

export interface ApprovalDetails extends ApprovalRecord {
  address: string;
}

export interface VerificationResult {
  documentId: string;
  address: string;
  valid: boolean;
}

export interface ContentHash {
  documentHash: string;
  sizeBytes: number;
}
