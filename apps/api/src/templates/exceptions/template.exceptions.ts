import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../../common/exceptions/api.exception';

export class TemplateNotFoundException extends ApiException {
  constructor(templateId: string) {
    super(
      HttpStatus.NOT_FOUND,
      'Not Found',
      'NOT_FOUND',
      `Template ${templateId} not found`,
    );
  }
}

export class ContractTypeNotFoundException extends ApiException {
  constructor(typeId: string) {
    super(
      HttpStatus.NOT_FOUND,
      'Not Found',
      'NOT_FOUND',
      `Schema for type ${typeId} not found`,
    );
  }
}
