/** Result of checking form inputs against a contract type before generation. */
export class InputValidationReportDto {
  valid!: boolean;
  errors!: string[];
  warnings!: string[];
}
