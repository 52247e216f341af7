import { IsNotEmpty, IsObject, IsString, MaxLength } from 'class-validator';
import type { ContractInputs } from '../../templates/templates.types';

export class ValidateInputDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  contractType!: string;

  @IsObject()
  inputs!: ContractInputs;
}
