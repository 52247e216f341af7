import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { ContractStatus } from '@clm/database';

export class UpdateStatusDto {
  @IsEnum(ContractStatus)
  status!: ContractStatus;

  /** Required when status is CANCELLED */
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  reason?: string;
}
