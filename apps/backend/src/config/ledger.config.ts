export type LedgerStoreKind = 'memory' | 'file';

export interface LedgerEnv {
  PORT: number;
  CORS_ORIGIN: string;
  LEDGER_NAMESPACE: string;
  LEDGER_STORE: LedgerStoreKind;
  LEDGER_FILE_PATH: string;
  SIGNATURE_MAX_AGE_SECONDS: number;
}

export const DEFAULT_LEDGER_NAMESPACE = `0x${'0'.repeat(63)}1`;

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const STORE_KINDS: readonly LedgerStoreKind[] = ['memory', 'file'];

function readString(raw: Record<string, unknown>, name: string, fallback: string): string {
  const value = raw[name];
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }

  return fallback;
}

function readPositiveInt(raw: Record<string, unknown>, name: string, fallback: number): number {
  const value = readString(raw, name, String(fallback));
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got: ${value}`);
  }

  return parsed;
}

function isStoreKind(value: string): value is LedgerStoreKind {
  return STORE_KINDS.some((kind) => kind === value);
}

/**
 * Validates the raw environment for `ConfigModule.forRoot`. The returned
 * object replaces the raw values inside `ConfigService`.
 */
export function validateLedgerEnv(raw: Record<string, unknown>): LedgerEnv {
  const namespace = readString(raw, 'LEDGER_NAMESPACE', DEFAULT_LEDGER_NAMESPACE);
  if (!ADDRESS_PATTERN.test(namespace)) {
    throw new Error(`LEDGER_NAMESPACE must be a 32-byte 0x-prefixed hex address, got: ${namespace}`);
  }

  const store = readString(raw, 'LEDGER_STORE', 'memory').toLowerCase();
  if (!isStoreKind(store)) {
    throw new Error(`LEDGER_STORE must be one of: ${STORE_KINDS.join(', ')}. Got: ${store}`);
  }

  const filePath = readString(raw, 'LEDGER_FILE_PATH', '');
  if (store === 'file' && !filePath) {
    throw new Error('LEDGER_FILE_PATH is required when LEDGER_STORE=file');
  }

  return {
    PORT: readPositiveInt(raw, 'PORT', 3000),
    CORS_ORIGIN: readString(raw, 'CORS_ORIGIN', 'http://localhost:5173'),
    LEDGER_NAMESPACE: namespace.toLowerCase(),
    LEDGER_STORE: store,
    LEDGER_FILE_PATH: filePath,
    SIGNATURE_MAX_AGE_SECONDS: readPositiveInt(raw, 'SIGNATURE_MAX_AGE_SECONDS', 300),
  };
}
