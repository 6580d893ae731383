import type { LedgerAccount, LedgerEvent, LedgerEventInput, LedgerEventQuery } from './ledger.types';

export const LEDGER_STORE = Symbol('LEDGER_STORE');
export const LEDGER_CLOCK = Symbol('LEDGER_CLOCK');

export const DEFAULT_EVENT_LIMIT = 50;
export const MAX_EVENT_LIMIT = 300;

export interface LedgerClock {
  /** Unix time in whole seconds. */
  now(): number;
}

export const systemClock: LedgerClock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Staged view handed to a transaction body. Nothing is visible until it returns. */
export interface LedgerTransaction {
  load(address: string): LedgerAccount | undefined;
  /** Insert-if-absent. Returns false when the address is already occupied. */
  create(address: string, account: LedgerAccount): boolean;
  write(address: string, account: LedgerAccount): void;
  emit(event: LedgerEventInput): void;
}

export interface LedgerStore {
  readonly kind: string;
  read(address: string): Promise<LedgerAccount | undefined>;
  /**
   * Runs `body` serialized against every other transaction. Its staged
   * writes and events are committed together, or dropped if it throws.
   */
  transact<R>(body: (tx: LedgerTransaction) => R): Promise<R>;
  events(query?: LedgerEventQuery): Promise<LedgerEvent[]>;
}
