import { IsOptional, IsString, Length } from 'class-validator';

export class UpdateContractDto {
  @IsOptional()
  @IsString()
  @Length(3, 500)
  title?: string;
}
