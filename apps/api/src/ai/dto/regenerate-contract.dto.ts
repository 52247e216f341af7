import {
  IsBoolean,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
  Length,
} from 'class-validator';
import type { ContractInputs } from '../../templates/templates.types';

/** Body of POST /ai/regenerate, stored as the job's parameters. */
export class RegenerateContractDto {
  @IsUUID()
  contractId!: string;

  @IsString()
  @Length(3, 2000)
  feedback!: string;

  /** Defaults to true */
  @IsOptional()
  @IsBoolean()
  preserveStructure?: boolean;

  /** Used when starting again from the template */
  @IsOptional()
  @IsObject()
  inputs?: ContractInputs;

  @IsOptional()
  @IsString()
  @Length(2, 10)
  jurisdiction?: string;
}
