import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { LedgerStoreKind } from '../config/ledger.config';
import { FileLedgerStore } from './file-ledger.store';
import { InMemoryLedgerStore } from './in-memory-ledger.store';
import { LedgerController } from './ledger.controller';
import { LEDGER_CLOCK, LEDGER_STORE, type LedgerClock, type LedgerStore, systemClock } from './ledger.store';

@Global()
@Module({
  controllers: [LedgerController],
  providers: [
    {
      provide: LEDGER_CLOCK,
      useValue: systemClock,
    },
    {
      provide: LEDGER_STORE,
      inject: [ConfigService, LEDGER_CLOCK],
      useFactory: async (config: ConfigService, clock: LedgerClock): Promise<LedgerStore> => {
        const kind = config.get<LedgerStoreKind>('LEDGER_STORE', 'memory');
        const store =
          kind === 'file'
            ? await FileLedgerStore.open(config.get<string>('LEDGER_FILE_PATH', ''), clock)
            : new InMemoryLedgerStore(clock);

        new Logger('LedgerModule').log(`Ledger store: ${store.kind}`);
        return store;
      },
    },
  ],
  exports: [LEDGER_STORE, LEDGER_CLOCK],
})
export class LedgerModule {}
