import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { LedgerError, LedgerErrorCode } from '../common/ledger-error';
import { DEFAULT_LEDGER_NAMESPACE } from '../config/ledger.config';
import { IotaIdentityService } from '../iota/iota.service';
import { adminRegistryAddress } from '../ledger/ledger-address';
import { LEDGER_STORE, type LedgerStore, type LedgerTransaction } from '../ledger/ledger.store';
import type { AdminRegistry } from '../ledger/ledger.types';
import { addAdmin, initializeAdminRegistry, isAdmin, removeAdmin } from './admin-registry';

@Injectable()
export class AdminsService {
  private readonly logger = new Logger(AdminsService.name);
  readonly registryAddress: string;

  constructor(
    @Inject(LEDGER_STORE) private readonly store: LedgerStore,
    @Inject(IotaIdentityService) private readonly identity: IotaIdentityService,
    @Inject(ConfigService) config: ConfigService,
  ) {
    this.registryAddress = adminRegistryAddress(config.get<string>('LEDGER_NAMESPACE', DEFAULT_LEDGER_NAMESPACE));
  }

  async initialize(caller: string) {
    const authority = this.identity.normalizeAddress(caller);
    const registry = initializeAdminRegistry(authority);

    await this.store.transact((tx) => {
      if (!tx.create(this.registryAddress, { kind: 'admin-registry', data: registry })) {
        throw new LedgerError(LedgerErrorCode.AlreadyInitialized);
      }

      tx.emit({ type: 'AdminRegistryInitialized', payload: { admin: authority, authority } });
    });

    this.logger.log(`Admin registry initialized with authority: ${authority}`);
    return this.present(registry);
  }

  async addAdmin(caller: string, newAdmin: string) {
    const authority = this.identity.normalizeAddress(caller);
    const admin = this.identity.normalizeAddress(newAdmin);

    const registry = await this.store.transact((tx) => {
      const next = addAdmin(this.requireRegistry(tx), authority, admin);
      tx.write(this.registryAddress, { kind: 'admin-registry', data: next });
      tx.emit({ type: 'AdminAdded', payload: { admin, authority } });
      return next;
    });

    this.logger.log(`New admin added: ${admin}`);
    return this.present(registry);
  }

  async removeAdmin(caller: string, target: string) {
    const authority = this.identity.normalizeAddress(caller);
    const admin = this.identity.normalizeAddress(target);

    const registry = await this.store.transact((tx) => {
      const next = removeAdmin(this.requireRegistry(tx), authority, admin);
      tx.write(this.registryAddress, { kind: 'admin-registry', data: next });
      tx.emit({ type: 'AdminRemoved', payload: { admin, authority } });
      return next;
    });

    this.logger.log(`Admin removed: ${admin}`);
    return this.present(registry);
  }

  async getRegistry(): Promise<AdminRegistry | undefined> {
    const account = await this.store.read(this.registryAddress);
    return account?.kind === 'admin-registry' ? account.data : undefined;
  }

  async getRegistryDetails() {
    const registry = await this.getRegistry();
    if (!registry) {
      throw new LedgerError(LedgerErrorCode.AdminRegistryNotInitialized);
    }

    return this.present(registry);
  }

  async isAdmin(address: string) {
    const normalized = this.identity.normalizeAddress(address);
    const registry = await this.getRegistry();

    return {
      address: normalized,
      isAdmin: registry ? isAdmin(registry, normalized) : false,
    };
  }

  private requireRegistry(tx: LedgerTransaction): AdminRegistry {
    const account = tx.load(this.registryAddress);
    if (account?.kind !== 'admin-registry') {
      throw new LedgerError(LedgerErrorCode.AdminRegistryNotInitialized);
    }

    return account.data;
  }

  private present(registry: AdminRegistry) {
    return {
      address: this.registryAddress,
      authority: registry.authority,
      admins: registry.admins,
      adminCount: registry.adminCount,
    };
  }
}
