import { IsUUID } from 'class-validator';

/** Body of POST /documents/generate-pdf, stored as the job's parameters. */
export class GeneratePdfDto {
  @IsUUID()
  contractId!: string;
}
