import { UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';

export interface SignedRequest extends Request {
  callerAddress?: string;
}

export function requireCaller(request: SignedRequest): string {
  if (!request.callerAddress) {
    throw new UnauthorizedException('Caller signature required');
  }

  return request.callerAddress;
}
