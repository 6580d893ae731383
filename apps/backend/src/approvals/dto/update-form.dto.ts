import { IsString } from 'class-validator';

export class UpdateFormDto {
  @IsString()
  metadata!: string;
}
