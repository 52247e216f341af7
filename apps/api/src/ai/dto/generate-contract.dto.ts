import { IsObject, IsOptional, IsString, IsUUID, Length } from 'class-validator';
import type { ContractInputs } from '../../templates/templates.types';

/** Body of POST /ai/generate-contract, stored as the job's parameters. */
export class GenerateContractDto {
  @IsUUID()
  contractId!: string;

  @IsObject()
  inputs!: ContractInputs;

  @IsOptional()
  @IsString()
  @Length(2, 10)
  jurisdiction?: string;
}
