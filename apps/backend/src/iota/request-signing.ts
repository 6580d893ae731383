import type { Signer } from '@iota/iota-sdk/cryptography';

export const SIGNATURE_HEADER = 'x-ledger-signature';
export const TIMESTAMP_HEADER = 'x-ledger-timestamp';

const MESSAGE_PREFIX = 'approval-ledger/v1';

export interface LedgerRequest {
  /** `LEDGER_NAMESPACE` of the ledger the request is meant for. */
  namespace: string;
  method: string;
  path: string;
  timestamp: number;
  body?: unknown;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => [key, canonicalize(item)]),
    );
  }

  return value;
}

/** JSON with object keys sorted; an absent body encodes as `{}`. */
export function canonicalJson(body: unknown): string {
  return JSON.stringify(canonicalize(body ?? {}));
}

export function buildSignedMessage(request: LedgerRequest): Uint8Array {
  const text = [
    MESSAGE_PREFIX,
    request.namespace.toLowerCase(),
    request.method.toUpperCase(),
    request.path,
    String(request.timestamp),
    canonicalJson(request.body),
  ].join('\n');

  return new TextEncoder().encode(text);
}

export async function signLedgerRequest(signer: Signer, request: LedgerRequest): Promise<Record<string, string>> {
  const { signature } = await signer.signPersonalMessage(buildSignedMessage(request));

  return {
    [SIGNATURE_HEADER]: signature,
    [TIMESTAMP_HEADER]: String(request.timestamp),
  };
}
