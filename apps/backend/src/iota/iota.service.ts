import { BadRequestException, Injectable, UnauthorizedException } from '@nestjs/common';
import { isValidIotaAddress, normalizeIotaAddress } from '@iota/iota-sdk/utils';
import { verifyPersonalMessageSignature } from '@iota/iota-sdk/verify';

@Injectable()
export class IotaIdentityService {
  normalizeAddress(address: string): string {
    const normalized = normalizeIotaAddress(address.trim()).toLowerCase();
    if (!isValidIotaAddress(normalized)) {
      throw new BadRequestException(`Invalid IOTA address: ${address}`);
    }

    return normalized;
  }

  /** Returns the address of the key that produced `signature` over `message`. */
  async recoverSigner(message: Uint8Array, signature: string): Promise<string> {
    try {
      const publicKey = await verifyPersonalMessageSignature(message, signature);
      return publicKey.toIotaAddress().toLowerCase();
    } catch (error) {
      throw new UnauthorizedException(
        `Invalid caller signature: ${error instanceof Error ? error.message : 'unknown error'}`,
      );
    }
  }
}
