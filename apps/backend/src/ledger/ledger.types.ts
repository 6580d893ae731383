export interface AdminRegistry {
  authority: string;
  admins: string[];
  adminCount: number;
}

export interface ApprovalRecord {
  documentId: string;
  documentHash: string;
  signer: string;
  approvedAt: number;
  metadata: string;
}

export interface AdminRegistryAccount {
  kind: 'admin-registry';
  data: AdminRegistry;
}

export interface ApprovalRecordAccount {
  kind: 'form-approval';
  data: ApprovalRecord;
}

export type LedgerAccount = AdminRegistryAccount | ApprovalRecordAccount;

export type LedgerEventType =
  | 'AdminRegistryInitialized'
  | 'AdminAdded'
  | 'AdminRemoved'
  | 'FormApproved'
  | 'FormApprovalUpdated';

export interface LedgerEventInput {
  type: LedgerEventType;
  payload: Record<string, string | number>;
}

export interface LedgerEvent extends LedgerEventInput {
  seq: number;
  timestamp: number;
}

export interface LedgerEventQuery {
  type?: LedgerEventType;
  documentId?: string;
  limit?: number;
}

export const LEDGER_EVENT_TYPES: readonly LedgerEventType[] = [
  'AdminRegistryInitialized',
  'AdminAdded',
  'AdminRemoved',
  'FormApproved',
  'FormApprovalUpdated',
];
