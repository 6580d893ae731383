import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { MAX_ADMINS } from '../admins/admin-registry';
import { FORM_HASH_LENGTH, MAX_FORM_ID_LENGTH, MAX_METADATA_LENGTH } from '../approvals/approval-registry';
import { ADMIN_CONFIG_SEED, adminRegistryAddress, FORM_APPROVAL_SEED } from '../ledger/ledger-address';
import { LEDGER_STORE, type LedgerStore } from '../ledger/ledger.store';
import { DEFAULT_LEDGER_NAMESPACE } from './ledger.config';

@Controller('config')
export class ConfigController {
  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(LEDGER_STORE) private readonly store: LedgerStore,
  ) {}

  @Get()
  getConfig() {
    const namespace = this.config.get<string>('LEDGER_NAMESPACE', DEFAULT_LEDGER_NAMESPACE);

    return {
      namespace,
      store: this.store.kind,
      adminRegistryAddress: adminRegistryAddress(namespace),
      seeds: {
        adminRegistry: ADMIN_CONFIG_SEED,
        formApproval: FORM_APPROVAL_SEED,
      },
      signatureMaxAgeSeconds: this.config.get<number>('SIGNATURE_MAX_AGE_SECONDS', 300),
      limits: {
        maxAdmins: MAX_ADMINS,
        maxFormIdBytes: MAX_FORM_ID_LENGTH,
        maxMetadataBytes: MAX_METADATA_LENGTH,
        formHashBytes: FORM_HASH_LENGTH,
      },
    };
  }
}
