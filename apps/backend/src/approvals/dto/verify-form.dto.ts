import { Matches } from 'class-validator';

export class VerifyFormDto {
  @Matches(/^0x[a-fA-F0-9]{64}$/)
  expectedHash!: string;
}
