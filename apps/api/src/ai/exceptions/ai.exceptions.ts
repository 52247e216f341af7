import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../../common/exceptions/api.exception';

/** Generation inputs failed the contract type's form schema. Recorded on the job. */
export class GenerationInputsInvalidException extends ApiException {
  readonly details: string[];

  constructor(details: string[]) {
    super(
      HttpStatus.BAD_REQUEST,
      'Bad Request',
      'VALIDATION_ERROR',
      `Invalid generation inputs: ${details.join('; ')}`,
    );
    this.details = details;
  }
}

/** Revision that keeps the structure was asked for a contract without content. */
export class NothingToReviseException extends ApiException {
  constructor(contractId: string) {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'NO_CONTENT',
      `Contract "${contractId}" has no content to revise`,
    );
  }
}
