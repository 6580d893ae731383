import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

export class SignFormDto {
  @IsString()
  @IsNotEmpty()
  documentId!: string;

  @Matches(/^0x[a-fA-F0-9]{64}$/)
  documentHash!: string;

  @IsOptional()
  @IsString()
  metadata?: string;
}
