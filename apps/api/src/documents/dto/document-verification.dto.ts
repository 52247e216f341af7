/** Result of POST /documents/:contractId/verify. */
export class DocumentVerificationDto {
  contractId!: string;
  documentKey!: string;
  /** True when the stored bytes still hash to `documentHash` */
  valid!: boolean;
  /** sha256 recorded at generation, hex */
  documentHash!: string;
  /** sha256 of the bytes in storage now, hex */
  actualHash!: string;
  verifiedAt!: string;
}
