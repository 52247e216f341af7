import { Injectable, Logger } from '@nestjs/common';
import catalogueData from './data/templates.json';
import type {
  ContractInputs,
  ContractTemplate,
  ContractTypeDefinition,
  TemplateCatalogue,
} from './templates.types';
import {
  ContractTypeNotFoundException,
  TemplateNotFoundException,
} from './exceptions/template.exceptions';
import { InputValidationReportDto } from './dto/input-validation-report.dto';

const CATALOGUE: TemplateCatalogue = catalogueData;

/**
 * TemplatesService - the static contract catalogue.
 *
 * Templates and per-type form schemas ship with the service in
 * data/templates.json; nothing here touches the database.
 */
@Injectable()
export class TemplatesService {
  private readonly logger = new Logger(TemplatesService.name);
  private readonly catalogue: TemplateCatalogue;

  constructor() {
    this.catalogue = CATALOGUE;
  }

  listTemplates(
    filters: { category?: string; jurisdiction?: string } = {},
    viewerId: string | null = null,
  ): ContractTemplate[] {
    this.logger.debug(
      `Listing templates for ${viewerId ?? 'anonymous viewer'}` +
        (filters.category ? `, category=${filters.category}` : '') +
        (filters.jurisdiction ? `, jurisdiction=${filters.jurisdiction}` : ''),
    );
    return this.catalogue.templates.filter(
      (t) =>
        (!filters.category || t.category === filters.category) &&
        (!filters.jurisdiction || t.jurisdiction === filters.jurisdiction),
    );
  }

  getTemplate(templateId: string): ContractTemplate {
    const template = this.catalogue.templates.find((t) => t.id === templateId);
    if (!template) {
      throw new TemplateNotFoundException(templateId);
    }
    return template;
  }

  findTemplate(templateId: string): ContractTemplate | undefined {
    return this.catalogue.templates.find((t) => t.id === templateId);
  }

  listContractTypes(): ContractTypeDefinition[] {
    return [...this.catalogue.contractTypes];
  }

  getContractType(typeId: string): ContractTypeDefinition {
    const definition = this.findContractType(typeId);
    if (!definition) {
      throw new ContractTypeNotFoundException(typeId);
    }
    return definition;
  }

  findContractType(typeId: string): ContractTypeDefinition | undefined {
    return this.catalogue.contractTypes.find((t) => t.id === typeId);
  }

  /** Body used to generate a contract of this type; types without one share the default. */
  getBody(typeId: string): string {
    return this.findContractType(typeId)?.body ?? this.catalogue.defaultBody;
  }

  /**
   * Checks inputs before generation. Never throws: unknown types and
   * missing fields are reported as errors in the result.
   */
  validateInputs(
    contractType: string,
    inputs: ContractInputs,
  ): InputValidationReportDto {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (Object.keys(inputs).length === 0) {
      errors.push('No inputs provided');
    }

    const definition = this.findContractType(contractType);
    if (!definition) {
      errors.push(`Unknown contract type: ${contractType}`);
      return { valid: false, errors, warnings };
    }

    for (const field of definition.fields) {
      const value = inputs[field.name];
      const present = value !== undefined && value !== null && value !== '';

      if (field.required && !present) {
        errors.push(`Missing required field: ${field.name}`);
        continue;
      }
      if (!present) {
        continue;
      }

      if (field.type === 'number' && !isNumeric(value)) {
        errors.push(`Field ${field.name} must be a number`);
      }
      if (
        field.options &&
        !field.options.some((option) => option.value === value)
      ) {
        errors.push(
          `Field ${field.name} must be one of: ${field.options.map((o) => o.value).join(', ')}`,
        );
      }
    }

    const known = new Set(definition.fields.map((f) => f.name));
    for (const key of Object.keys(inputs)) {
      if (!known.has(key)) {
        warnings.push(`Unknown field will be ignored: ${key}`);
      }
    }

    if (known.has('start_date') && !inputs['start_date']) {
      warnings.push('Specifying a start date is recommended');
    }

    return { valid: errors.length === 0, errors, warnings };
  }
}

function isNumeric(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value));
}
