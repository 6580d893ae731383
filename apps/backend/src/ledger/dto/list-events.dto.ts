import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

import { MAX_EVENT_LIMIT } from '../ledger.store';
import { LEDGER_EVENT_TYPES, type LedgerEventType } from '../ledger.types';

export class ListEventsDto {
  @IsOptional()
  @IsIn(LEDGER_EVENT_TYPES)
  type?: LedgerEventType;

  @IsOptional()
  @IsString()
  documentId?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_EVENT_LIMIT)
  limit?: number;
}
