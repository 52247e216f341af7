import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ContentSource } from '@clm/database';

/** Max stored HTML size per version (characters) */
export const MAX_CONTENT_LENGTH = 500_000;

export class UpdateContentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_CONTENT_LENGTH)
  content!: string;

  /** Defaults to USER; AI content on a DRAFT or GENERATED contract is a generation. */
  @IsOptional()
  @IsEnum(ContentSource)
  source?: ContentSource;
}
