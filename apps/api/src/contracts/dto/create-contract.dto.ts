import { IsNotEmpty, IsString, Length, MaxLength } from 'class-validator';

export class CreateContractDto {
  @IsString()
  @Length(3, 500)
  title!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  templateId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  contractType!: string;
}
