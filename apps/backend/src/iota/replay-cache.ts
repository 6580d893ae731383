import { Injectable } from '@nestjs/common';
import { createHash } from 'node:crypto';

/**
 * Signatures accepted while their timestamp is still inside the freshness
 * window. Entries older than the window are pruned on every claim.
 */
@Injectable()
export class SignatureReplayCache {
  private readonly seen = new Map<string, number>();

  /** Returns false when the signature was already claimed. */
  claim(signature: string, timestamp: number, now: number, maxAge: number): boolean {
    this.prune(now, maxAge);

    const key = this.keyOf(signature);
    if (this.seen.has(key)) {
      return false;
    }

    this.seen.set(key, timestamp);
    return true;
  }

  release(signature: string): void {
    this.seen.delete(this.keyOf(signature));
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(now: number, maxAge: number) {
    for (const [key, timestamp] of this.seen) {
      if (Math.abs(now - timestamp) > maxAge) {
        this.seen.delete(key);
      }
    }
  }

  private keyOf(signature: string): string {
    return createHash('sha256').update(signature).digest('hex');
  }
}
