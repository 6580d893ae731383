import { Module } from '@nestjs/common';

import { CallerSignatureGuard } from './caller-signature.guard';
import { IotaIdentityService } from './iota.service';
import { SignatureReplayCache } from './replay-cache';

@Module({
  providers: [IotaIdentityService, SignatureReplayCache, CallerSignatureGuard],
  exports: [IotaIdentityService, SignatureReplayCache, CallerSignatureGuard],
})
export class IotaModule {}
