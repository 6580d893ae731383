import { Ed25519Keypair } from '@iota/iota-sdk/keypairs/ed25519';
import { type ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describe, expect, it } from 'vitest';

import { CallerSignatureGuard } from '../caller-signature.guard';
import { IotaIdentityService } from '../iota.service';
import { SignatureReplayCache } from '../replay-cache';
import { canonicalJson, signLedgerRequest } from '../request-signing';

const NOW = 1_700_000_000;
const NAMESPACE = `0x${'0'.repeat(62)}42`;

interface FakeRequest {
  method: string;
  originalUrl: string;
  headers: Record<string, string>;
  body: unknown;
  callerAddress?: string;
}

function makeContext(request: FakeRequest): ExecutionContext {
  return {
    switchToHttp: () => ({
      getRequest: () => request,
    }),
  } as unknown as ExecutionContext;
}

function makeGuard() {
  return new CallerSignatureGuard(
    new IotaIdentityService(),
    new ConfigService({ SIGNATURE_MAX_AGE_SECONDS: 300, LEDGER_NAMESPACE: NAMESPACE }),
    { now: () => NOW },
    new SignatureReplayCache(),
  );
}

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[2,{"y":2,"z":1}]},"b":1}',
    );
  });

  it('encodes an absent body as an empty object', () => {
    expect(canonicalJson(undefined)).toBe('{}');
  });
});

describe('CallerSignatureGuard', () => {
  it('sets the caller to the address of the signing key', async () => {
    const keypair = Ed25519Keypair.generate();
    const body = { newAdmin: `0x${'b'.repeat(64)}` };
    const headers = await signLedgerRequest(keypair, {
      namespace: NAMESPACE,
      method: 'POST',
      path: '/api/admin/admins',
      timestamp: NOW - 10,
      body,
    });
    const request: FakeRequest = { method: 'POST', originalUrl: '/api/admin/admins', headers, body };

    await expect(makeGuard().canActivate(makeContext(request))).resolves.toBe(true);
    expect(request.callerAddress).toBe(keypair.toIotaAddress().toLowerCase());
  });

  it('rejects a body that differs from the signed one', async () => {
    const keypair = Ed25519Keypair.generate();
    const headers = await signLedgerRequest(keypair, {
      namespace: NAMESPACE,
      method: 'PATCH',
      path: '/api/approvals/f1',
      timestamp: NOW,
      body: { metadata: 'v2' },
    });
    const request: FakeRequest = {
      method: 'PATCH',
      originalUrl: '/api/approvals/f1',
      headers,
      body: { metadata: 'tampered' },
    };

    await expect(makeGuard().canActivate(makeContext(request))).rejects.toThrow(UnauthorizedException);
    expect(request.callerAddress).toBeUndefined();
  });

  it('rejects expired timestamps', async () => {
    const keypair = Ed25519Keypair.generate();
    const headers = await signLedgerRequest(keypair, {
      namespace: NAMESPACE,
      method: 'POST',
      path: '/api/admin/initialize',
      timestamp: NOW - 301,
    });
    const request: FakeRequest = { method: 'POST', originalUrl: '/api/admin/initialize', headers, body: {} };

    await expect(makeGuard().canActivate(makeContext(request))).rejects.toThrow('Caller signature has expired');
  });

  it('rejects requests without a signature', async () => {
    const request: FakeRequest = {
      method: 'POST',
      originalUrl: '/api/admin/initialize',
      headers: { 'x-ledger-timestamp': String(NOW) },
      body: {},
    };

    await expect(makeGuard().canActivate(makeContext(request))).rejects.toThrow('Missing x-ledger-signature header');
  });

  it('rejects a malformed timestamp', async () => {
    const request: FakeRequest = {
      method: 'POST',
      originalUrl: '/api/admin/initialize',
      headers: { 'x-ledger-signature': 'c2lnbmF0dXJl', 'x-ledger-timestamp': 'yesterday' },
      body: {},
    };

    await expect(makeGuard().canActivate(makeContext(request))).rejects.toThrow(
      'Missing or malformed x-ledger-timestamp header',
    );
  });

  it('rejects garbage signatures', async () => {
    const request: FakeRequest = {
      method: 'POST',
      originalUrl: '/api/admin/initialize',
      headers: { 'x-ledger-signature': 'c2lnbmF0dXJl', 'x-ledger-timestamp': String(NOW) },
      body: {},
    };

    await expect(makeGuard().canActivate(makeContext(request))).rejects.toThrow(UnauthorizedException);
  });

  it('rejects the same signed request a second time', async () => {
    const keypair = Ed25519Keypair.generate();
    const body = { newAdmin: `0x${'b'.repeat(64)}` };
    const headers = await signLedgerRequest(keypair, {
      namespace: NAMESPACE,
      method: 'POST',
      path: '/api/admin/admins',
      timestamp: NOW,
      body,
    });
    const guard = makeGuard();

    await expect(
      guard.canActivate(makeContext({ method: 'POST', originalUrl: '/api/admin/admins', headers, body })),
    ).resolves.toBe(true);

    const replayed: FakeRequest = { method: 'POST', originalUrl: '/api/admin/admins', headers: { ...headers }, body };
    await expect(guard.canActivate(makeContext(replayed))).rejects.toThrow('Caller signature has already been used');
    expect(replayed.callerAddress).toBeUndefined();
  });

  it('lets only one of two concurrent copies through', async () => {
    const keypair = Ed25519Keypair.generate();
    const headers = await signLedgerRequest(keypair, {
      namespace: NAMESPACE,
      method: 'DELETE',
      path: `/api/admin/admins/0x${'b'.repeat(64)}`,
      timestamp: NOW,
    });
    const guard = makeGuard();
    const request = () =>
      makeContext({ method: 'DELETE', originalUrl: `/api/admin/admins/0x${'b'.repeat(64)}`, headers, body: {} });

    const results = await Promise.allSettled([guard.canActivate(request()), guard.canActivate(request())]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
  });

  it('still accepts the genuine request after a tampered copy failed', async () => {
    const keypair = Ed25519Keypair.generate();
    const headers = await signLedgerRequest(keypair, {
      namespace: NAMESPACE,
      method: 'PATCH',
      path: '/api/approvals/f1',
      timestamp: NOW,
      body: { metadata: 'v2' },
    });
    const guard = makeGuard();

    await expect(
      guard.canActivate(
        makeContext({ method: 'PATCH', originalUrl: '/api/approvals/f1', headers, body: { metadata: 'tampered' } }),
      ),
    ).rejects.toThrow(UnauthorizedException);
    await expect(
      guard.canActivate(
        makeContext({ method: 'PATCH', originalUrl: '/api/approvals/f1', headers, body: { metadata: 'v2' } }),
      ),
    ).resolves.toBe(true);
  });

  it('rejects a request signed for another ledger namespace', async () => {
    const keypair = Ed25519Keypair.generate();
    const headers = await signLedgerRequest(keypair, {
      namespace: `0x${'0'.repeat(63)}7`,
      method: 'POST',
      path: '/api/admin/initialize',
      timestamp: NOW,
    });
    const request: FakeRequest = { method: 'POST', originalUrl: '/api/admin/initialize', headers, body: {} };

    await expect(makeGuard().canActivate(makeContext(request))).rejects.toThrow(UnauthorizedException);
    expect(request.callerAddress).toBeUndefined();
  });
});

describe('SignatureReplayCache', () => {
  it('forgets signatures once their timestamp leaves the window', () => {
    const cache = new SignatureReplayCache();

    expect(cache.claim('sig-a', NOW, NOW, 300)).toBe(true);
    expect(cache.claim('sig-a', NOW, NOW + 300, 300)).toBe(false);
    expect(cache.claim('sig-b', NOW + 301, NOW + 301, 300)).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('releases a claim', () => {
    const cache = new SignatureReplayCache();
    cache.claim('sig-a', NOW, NOW, 300);
    cache.release('sig-a');

    expect(cache.claim('sig-a', NOW, NOW, 300)).toBe(true);
  });
});
