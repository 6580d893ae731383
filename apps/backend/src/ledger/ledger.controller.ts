import { Controller, Get, Inject, Query } from '@nestjs/common';

import { ListEventsDto } from './dto/list-events.dto';
import { LEDGER_STORE, type LedgerStore } from './ledger.store';

@Controller('events')
export class LedgerController {
  constructor(@Inject(LEDGER_STORE) private readonly store: LedgerStore) {}

  @Get()
  listEvents(@Query() query: ListEventsDto) {
    return this.store.events({
      type: query.type,
      documentId: query.documentId,
      limit: query.limit,
    });
  }
}
