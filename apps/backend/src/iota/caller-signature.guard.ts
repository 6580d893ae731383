import {
  type CanActivate,
  type ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_LEDGER_NAMESPACE } from '../config/ledger.config';
import { LEDGER_CLOCK, type LedgerClock } from '../ledger/ledger.store';
import { IotaIdentityService } from './iota.service';
import { SignatureReplayCache } from './replay-cache';
import { buildSignedMessage, SIGNATURE_HEADER, TIMESTAMP_HEADER } from './request-signing';
import type { SignedRequest } from './signed-request';

@Injectable()
export class CallerSignatureGuard implements CanActivate {
  private readonly logger = new Logger(CallerSignatureGuard.name);

  constructor(
    @Inject(IotaIdentityService) private readonly identity: IotaIdentityService,
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
    @Inject(SignatureReplayCache) private readonly replays: SignatureReplayCache,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<SignedRequest>();
    const signature = request.headers[SIGNATURE_HEADER];
    const timestampHeader = request.headers[TIMESTAMP_HEADER];

    if (typeof signature !== 'string' || !signature) {
      throw new UnauthorizedException(`Missing ${SIGNATURE_HEADER} header`);
    }

    if (typeof timestampHeader !== 'string' || !/^\d+$/.test(timestampHeader)) {
      throw new UnauthorizedException(`Missing or malformed ${TIMESTAMP_HEADER} header`);
    }

    const timestamp = Number(timestampHeader);
    const now = this.clock.now();
    const maxAge = this.config.get<number>('SIGNATURE_MAX_AGE_SECONDS', 300);
    if (Math.abs(now - timestamp) > maxAge) {
      throw new UnauthorizedException('Caller signature has expired');
    }

    // reserved before verifying, released again if verification fails
    if (!this.replays.claim(signature, timestamp, now, maxAge)) {
      throw new UnauthorizedException('Caller signature has already been used');
    }

    const message = buildSignedMessage({
      namespace: this.config.get<string>('LEDGER_NAMESPACE', DEFAULT_LEDGER_NAMESPACE),
      method: request.method,
      path: request.originalUrl,
      timestamp,
      body: request.body,
    });

    try {
      request.callerAddress = await this.identity.recoverSigner(message, signature);
    } catch (error) {
      this.replays.release(signature);
      throw error;
    }
    this.logger.debug(`${request.method} ${request.originalUrl} signed by ${request.callerAddress}`);

    return true;
  }
}
