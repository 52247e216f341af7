import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../../common/exceptions/api.exception';

/** A PDF was requested for a contract that has no content version yet. */
export class ContractHasNoContentException extends ApiException {
  constructor(contractId: string) {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'NO_CONTENT',
      `Contract "${contractId}" has no content to render`,
    );
  }
}

/** The contract exists but no PDF has been generated for it. HTTP 404. */
export class DocumentNotFoundException extends ApiException {
  constructor(contractId: string) {
    super(
      HttpStatus.NOT_FOUND,
      'Not Found',
      'NOT_FOUND',
      `No document has been generated for contract "${contractId}"`,
    );
  }
}
