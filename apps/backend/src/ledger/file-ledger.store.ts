import { Logger } from '@nestjs/common';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { InMemoryLedgerStore, type LedgerSnapshot } from './in-memory-ledger.store';
import { decodeSnapshot } from './ledger-codec';
import { type LedgerClock, systemClock } from './ledger.store';

/**
 * Ledger store persisted as one JSON snapshot. Every committed transaction
 * rewrites the file through a temp file + rename, so a crash leaves either
 * the previous or the next state on disk.
 */
export class FileLedgerStore extends InMemoryLedgerStore {
  readonly kind: string = 'file';

  private readonly logger = new Logger(FileLedgerStore.name);
  private readonly filePath: string;

  private constructor(filePath: string, clock: LedgerClock) {
    super(clock);
    this.filePath = resolve(process.cwd(), filePath);
  }

  static async open(filePath: string, clock: LedgerClock = systemClock): Promise<FileLedgerStore> {
    const store = new FileLedgerStore(filePath, clock);
    await store.load();
    return store;
  }

  protected async persist(snapshot: LedgerSnapshot): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8');
    await rename(tempPath, this.filePath);
  }

  private async load(): Promise<void> {
    if (!existsSync(this.filePath)) {
      this.logger.log(`No ledger snapshot at ${this.filePath}, starting empty`);
      return;
    }

    const raw = await readFile(this.filePath, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(
        `Ledger snapshot ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const snapshot = decodeSnapshot(parsed);
    this.restore(snapshot);
    this.logger.log(
      `Loaded ${snapshot.accounts.length} accounts and ${snapshot.events.length} events from ${this.filePath}`,
    );
  }
}
