import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ListTemplatesQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(50)
  category?: string;

  @IsOptional()
  @IsString()
  @MaxLength(10)
  jurisdiction?: string;
}
