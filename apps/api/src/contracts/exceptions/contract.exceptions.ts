import { HttpStatus } from '@nestjs/common';
import type { ContractStatus } from '@clm/database';
import { ApiException } from '../../common/exceptions/api.exception';

/**
 * Unknown contract, soft-deleted contract, or one owned by someone else.
 * HTTP 404 in every case so ids cannot be enumerated.
 */
export class ContractNotFoundException extends ApiException {
  constructor(contractId: string) {
    super(
      HttpStatus.NOT_FOUND,
      'Not Found',
      'NOT_FOUND',
      `Contract "${contractId}" not found`,
    );
  }
}

/** The requested status is not reachable from the current one. HTTP 400. */
export class InvalidTransitionException extends ApiException {
  readonly from: ContractStatus;
  readonly to: ContractStatus;

  constructor(from: ContractStatus, to: ContractStatus) {
    super(
      HttpStatus.BAD_REQUEST,
      'Bad Request',
      'INVALID_TRANSITION',
      `Cannot transition from ${from} to ${to}`,
    );
    this.from = from;
    this.to = to;
  }
}

export class CancellationReasonRequiredException extends ApiException {
  constructor() {
    super(
      HttpStatus.BAD_REQUEST,
      'Bad Request',
      'VALIDATION_ERROR',
      'Reason required for cancellation',
    );
  }
}

/**
 * The contract changed between read and write (lost optimistic-concurrency
 * race). HTTP 409; the caller may reload and retry.
 */
export class ContractConflictException extends ApiException {
  constructor(contractId: string) {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'CONFLICT',
      `Contract "${contractId}" was modified concurrently; reload and retry`,
    );
  }
}

/** The contract's status forbids the requested edit. HTTP 409. */
export class ContractLockedException extends ApiException {
  constructor(status: ContractStatus, action: string) {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'CONFLICT',
      `Cannot ${action} of ${status} contract`,
    );
  }
}

export class SignedContractDeletionException extends ApiException {
  constructor() {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'CONFLICT',
      'Cannot delete signed contract',
    );
  }
}

/** templateId / contractType on create do not match the catalogue. HTTP 400. */
export class InvalidContractTemplateException extends ApiException {
  constructor(message: string) {
    super(HttpStatus.BAD_REQUEST, 'Bad Request', 'VALIDATION_ERROR', message);
  }
}

// ── Parties ────────────────────────────────────────────────

export class PartyNotFoundException extends ApiException {
  constructor(partyId: string) {
    super(HttpStatus.NOT_FOUND, 'Not Found', 'NOT_FOUND', `Party "${partyId}" not found`);
  }
}

/** Parties are frozen once the contract is SIGNED or CANCELLED. HTTP 409. */
export class PartiesLockedException extends ApiException {
  constructor(status: ContractStatus) {
    super(HttpStatus.CONFLICT, 'Conflict', 'CONFLICT', `Cannot add party to ${status} contract`);
  }
}

export class PartyEmailTakenException extends ApiException {
  constructor(email: string) {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'CONFLICT',
      `A party with email ${email} is already on this contract`,
    );
  }
}

export class SignedPartyRemovalException extends ApiException {
  constructor() {
    super(
      HttpStatus.CONFLICT,
      'Conflict',
      'CONFLICT',
      'Cannot remove party that has already signed',
    );
  }
}
