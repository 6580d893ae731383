import { MAX_ADMINS } from '../admins/admin-registry';
import type { LedgerSnapshot } from './in-memory-ledger.store';
import {
  LEDGER_EVENT_TYPES,
  type LedgerAccount,
  type LedgerEvent,
  type LedgerEventType,
} from './ledger.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function toStringValue(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new Error(`Ledger snapshot field "${field}" must be a string`);
  }

  return value;
}

function toNumberValue(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Ledger snapshot field "${field}" must be a finite number`);
  }

  return value;
}

function toEventType(value: unknown): LedgerEventType {
  const type = LEDGER_EVENT_TYPES.find((candidate) => candidate === value);
  if (!type) {
    throw new Error(`Unknown ledger event type: ${String(value)}`);
  }

  return type;
}

export function decodeAccount(input: unknown): LedgerAccount {
  if (!isRecord(input) || !isRecord(input.data)) {
    throw new Error('Ledger account must be an object with a data field');
  }

  const data = input.data;
  if (input.kind === 'admin-registry') {
    if (!Array.isArray(data.admins)) {
      throw new Error('Ledger snapshot field "admins" must be an array');
    }

    const admins = data.admins.map((admin) => toStringValue(admin, 'admins'));
    const adminCount = toNumberValue(data.adminCount, 'adminCount');
    if (adminCount !== admins.length) {
      throw new Error(`Admin registry lists ${admins.length} admins but records adminCount ${adminCount}`);
    }

    if (adminCount < 1 || adminCount > MAX_ADMINS) {
      throw new Error(`Admin registry must hold between 1 and ${MAX_ADMINS} admins, found ${adminCount}`);
    }

    if (new Set(admins).size !== admins.length) {
      throw new Error('Admin registry contains duplicate admins');
    }

    return {
      kind: 'admin-registry',
      data: {
        authority: toStringValue(data.authority, 'authority'),
        admins,
        adminCount,
      },
    };
  }

  if (input.kind === 'form-approval') {
    return {
      kind: 'form-approval',
      data: {
        documentId: toStringValue(data.documentId, 'documentId'),
        documentHash: toStringValue(data.documentHash, 'documentHash'),
        signer: toStringValue(data.signer, 'signer'),
        approvedAt: toNumberValue(data.approvedAt, 'approvedAt'),
        metadata: toStringValue(data.metadata, 'metadata'),
      },
    };
  }

  throw new Error(`Unknown ledger account kind: ${String(input.kind)}`);
}

export function decodeEvent(input: unknown): LedgerEvent {
  if (!isRecord(input) || !isRecord(input.payload)) {
    throw new Error('Ledger event must be an object with a payload field');
  }

  const payload: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(input.payload)) {
    payload[key] = typeof value === 'number' ? toNumberValue(value, key) : toStringValue(value, key);
  }

  return {
    seq: toNumberValue(input.seq, 'seq'),
    timestamp: toNumberValue(input.timestamp, 'timestamp'),
    type: toEventType(input.type),
    payload,
  };
}

export function decodeSnapshot(input: unknown): LedgerSnapshot {
  if (!isRecord(input) || !Array.isArray(input.accounts) || !Array.isArray(input.events)) {
    throw new Error('Ledger snapshot must contain accounts and events arrays');
  }

  return {
    accounts: input.accounts.map((entry: unknown) => {
      if (!isRecord(entry)) {
        throw new Error('Ledger snapshot account entry must be an object');
      }

      return {
        address: toStringValue(entry.address, 'address'),
        account: decodeAccount(entry.account),
      };
    }),
    events: input.events.map((event: unknown) => decodeEvent(event)),
  };
}
