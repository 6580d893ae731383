import {
  DEFAULT_EVENT_LIMIT,
  type LedgerClock,
  type LedgerStore,
  type LedgerTransaction,
  MAX_EVENT_LIMIT,
  systemClock,
} from './ledger.store';
import type { LedgerAccount, LedgerEvent, LedgerEventInput, LedgerEventQuery } from './ledger.types';

export interface LedgerSnapshot {
  accounts: Array<{ address: string; account: LedgerAccount }>;
  events: LedgerEvent[];
}

export class InMemoryLedgerStore implements LedgerStore {
  readonly kind: string = 'memory';

  private readonly accounts = new Map<string, LedgerAccount>();
  private readonly log: LedgerEvent[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(protected readonly clock: LedgerClock = systemClock) {}

  async read(address: string): Promise<LedgerAccount | undefined> {
    const account = this.accounts.get(address);
    return account ? structuredClone(account) : undefined;
  }

  transact<R>(body: (tx: LedgerTransaction) => R): Promise<R> {
    const run = this.queue.then(() => this.execute(body));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  async events(query: LedgerEventQuery = {}): Promise<LedgerEvent[]> {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_EVENT_LIMIT, 1), MAX_EVENT_LIMIT);

    return this.log
      .filter((event) => !query.type || event.type === query.type)
      .filter((event) => query.documentId === undefined || event.payload.documentId === query.documentId)
      .reverse()
      .slice(0, limit)
      .map((event) => structuredClone(event));
  }

  /** Called with the full post-commit state before it becomes visible. */
  protected async persist(_snapshot: LedgerSnapshot): Promise<void> {}

  protected restore(snapshot: LedgerSnapshot): void {
    this.accounts.clear();
    this.log.length = 0;

    for (const entry of snapshot.accounts) {
      this.accounts.set(entry.address, entry.account);
    }
    this.log.push(...snapshot.events);
  }

  private async execute<R>(body: (tx: LedgerTransaction) => R): Promise<R> {
    const staged = new Map<string, LedgerAccount>();
    const emitted: LedgerEventInput[] = [];
    const exists = (address: string) => staged.has(address) || this.accounts.has(address);

    const tx: LedgerTransaction = {
      load: (address) => {
        const account = staged.get(address) ?? this.accounts.get(address);
        return account ? structuredClone(account) : undefined;
      },
      create: (address, account) => {
        if (exists(address)) {
          return false;
        }

        staged.set(address, structuredClone(account));
        return true;
      },
      write: (address, account) => {
        if (!exists(address)) {
          throw new Error(`No ledger account at ${address}`);
        }

        staged.set(address, structuredClone(account));
      },
      emit: (event) => {
        emitted.push(structuredClone(event));
      },
    };

    const result = body(tx);
    if (staged.size === 0 && emitted.length === 0) {
      return result;
    }

    const timestamp = this.clock.now();
    const events = emitted.map((event, index) => ({
      seq: this.log.length + index + 1,
      timestamp,
      type: event.type,
      payload: event.payload,
    }));

    const nextAccounts = new Map(this.accounts);
    for (const [address, account] of staged) {
      nextAccounts.set(address, account);
    }

    await this.persist({
      accounts: [...nextAccounts.entries()].map(([address, account]) => ({ address, account })),
      events: [...this.log, ...events],
    });

    for (const [address, account] of staged) {
      this.accounts.set(address, account);
    }
    this.log.push(...events);

    return result;
  }
}
