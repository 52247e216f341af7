import {
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { PartyRole } from '@clm/database';

export class AddPartyDto {
  @IsEnum(PartyRole)
  role!: PartyRole;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsEmail()
  @MaxLength(255)
  email!: string;

  /** Signing order, 1-based; defaults to 1 */
  @IsOptional()
  @IsInt()
  @Min(1)
  order?: number;
}
