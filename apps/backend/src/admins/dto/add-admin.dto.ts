import { Matches } from 'class-validator';

export class AddAdminDto {
  @Matches(/^0x[a-fA-F0-9]{1,64}$/)
  newAdmin!: string;
}
