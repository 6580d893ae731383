import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'node:crypto';

import { LedgerError, LedgerErrorCode } from '../common/ledger-error';
import { DEFAULT_LEDGER_NAMESPACE } from '../config/ledger.config';
import { IotaIdentityService } from '../iota/iota.service';
import { canonicalJson } from '../iota/request-signing';
import { adminRegistryAddress, approvalRecordAddress } from '../ledger/ledger-address';
import { LEDGER_CLOCK, LEDGER_STORE, type LedgerClock, type LedgerStore } from '../ledger/ledger.store';
import type { AdminRegistry, ApprovalRecord, LedgerAccount } from '../ledger/ledger.types';
import {
  type FormSubmission,
  signFormSubmission,
  updateFormApproval,
  verifyFormApproval,
} from './approval-registry';
import type { ApprovalDetails, ContentHash, VerificationResult } from './approvals.types';

function asRegistry(account: LedgerAccount | undefined): AdminRegistry | undefined {
  return account?.kind === 'admin-registry' ? account.data : undefined;
}

function asRecord(account: LedgerAccount | undefined): ApprovalRecord | undefined {
  return account?.kind === 'form-approval' ? account.data : undefined;
}

@Injectable()
export class ApprovalsService {
  private readonly logger = new Logger(ApprovalsService.name);
  private readonly namespace: string;
  private readonly registryAddress: string;

  constructor(
    @Inject(LEDGER_STORE) private readonly store: LedgerStore,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
    @Inject(IotaIdentityService) private readonly identity: IotaIdentityService,
    @Inject(ConfigService) config: ConfigService,
  ) {
    this.namespace = config.get<string>('LEDGER_NAMESPACE', DEFAULT_LEDGER_NAMESPACE);
    this.registryAddress = adminRegistryAddress(this.namespace);
  }

  addressOf(documentId: string): string {
    return approvalRecordAddress(this.namespace, documentId);
  }

  async signFormSubmission(caller: string, submission: FormSubmission): Promise<ApprovalDetails> {
    const signer = this.identity.normalizeAddress(caller);
    const address = this.addressOf(submission.documentId);

    const record = await this.store.transact((tx) => {
      const next = signFormSubmission(asRegistry(tx.load(this.registryAddress)), signer, submission, this.clock.now());

      if (!tx.create(address, { kind: 'form-approval', data: next })) {
        throw new LedgerError(LedgerErrorCode.FormAlreadyApproved);
      }

      tx.emit({
        type: 'FormApproved',
        payload: {
          documentId: next.documentId,
          documentHash: next.documentHash,
          signer: next.signer,
          approvedAt: next.approvedAt,
        },
      });
      return next;
    });

    this.logger.log(`Form ${record.documentId} approved by admin ${record.signer} at timestamp ${record.approvedAt}`);
    return { ...record, address };
  }

  async updateFormApproval(caller: string, documentId: string, metadata: string): Promise<ApprovalDetails> {
    const signer = this.identity.normalizeAddress(caller);
    const address = this.addressOf(documentId);

    const record = await this.store.transact((tx) => {
      const next = updateFormApproval(
        asRecord(tx.load(address)),
        asRegistry(tx.load(this.registryAddress)),
        signer,
        metadata,
      );

      tx.write(address, { kind: 'form-approval', data: next });
      tx.emit({
        type: 'FormApprovalUpdated',
        payload: { documentId: next.documentId, signer: next.signer, metadata: next.metadata },
      });
      return next;
    });

    this.logger.log(`Form ${documentId} approval metadata updated by admin: ${signer}`);
    return { ...record, address };
  }

  async verifyFormApproval(documentId: string, expectedHash: string): Promise<VerificationResult> {
    const address = this.addressOf(documentId);
    const valid = verifyFormApproval(asRecord(await this.store.read(address)), expectedHash);

    this.logger.log(`Form ${documentId} verification result: ${valid}`);
    return { documentId, address, valid };
  }

  async getFormApprovalDetails(documentId: string): Promise<ApprovalDetails> {
    const address = this.addressOf(documentId);
    const record = asRecord(await this.store.read(address));
    if (!record) {
      throw new LedgerError(LedgerErrorCode.RecordNotFound);
    }

    return { ...record, address };
  }

  /** Strings are hashed as UTF-8; objects as their canonical JSON. */
  hashContent(content: string | Record<string, unknown>): ContentHash {
    const buffer = Buffer.from(typeof content === 'string' ? content : canonicalJson(content), 'utf8');

    return {
      documentHash: `0x${createHash('sha256').update(buffer).digest('hex')}`,
      sizeBytes: buffer.length,
    };
  }
}
