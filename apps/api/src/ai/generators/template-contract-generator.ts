import { Injectable, Logger } from '@nestjs/common';
import { TemplatesService } from '../../templates/templates.service';
import type { ContractInputs } from '../../templates/templates.types';
import {
  ContractGenerator,
  GeneratedContract,
  GenerationRequest,
  RevisionRequest,
} from './contract-generator';

export const TEMPLATE_MODEL = 'template-v1';

/** `{{name}}` or `{{name:number}}` */
const PLACEHOLDER = /\{\{\s*([a-zA-Z0-9_]+)(?::(number))?\s*\}\}/g;

const REVISION_NOTE = /\n?<section class="revision-note">[\s\S]*?<\/section>/g;

const NUMBER_FORMAT = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Fills the contract type's HTML body from the catalogue. Values are
 * HTML-escaped; placeholders without a value render as `[name]`.
 */
@Injectable()
export class TemplateContractGenerator extends ContractGenerator {
  private readonly logger = new Logger(TemplateContractGenerator.name);

  constructor(private readonly templatesService: TemplatesService) {
    super();
  }

  async generate(request: GenerationRequest): Promise<GeneratedContract> {
    const body = this.templatesService.getBody(request.contractType);
    const { content, missing } = fillPlaceholders(body, request.inputs);

    if (missing.length > 0) {
      this.logger.debug(
        `${request.contractType} generated with unfilled placeholders: ${missing.join(', ')}`,
      );
    }

    return { content, model: TEMPLATE_MODEL, missingPlaceholders: missing };
  }

  /**
   * Without a model there is nothing to rewrite: the text is kept (or
   * rebuilt from the template) and the feedback is recorded as a single
   * revision note at the end, replacing any earlier one.
   */
  async revise(request: RevisionRequest): Promise<GeneratedContract> {
    const base = request.preserveStructure
      ? { content: request.content.replace(REVISION_NOTE, ''), missing: [] }
      : fillPlaceholders(
          this.templatesService.getBody(request.contractType),
          request.inputs ?? {},
        );

    const note =
      '<section class="revision-note">' +
      `<p><em>Revised per feedback: ${escapeHtml(request.feedback.trim())}</em></p>` +
      '</section>';

    return {
      content: `${base.content}\n${note}`,
      model: TEMPLATE_MODEL,
      missingPlaceholders: base.missing,
    };
  }
}

export function fillPlaceholders(
  body: string,
  inputs: ContractInputs,
): { content: string; missing: string[] } {
  const missing = new Set<string>();

  const content = body.replace(
    PLACEHOLDER,
    (_match: string, name: string, format: string | undefined) => {
      const value = inputs[name];
      if (value === undefined || value === null || value === '') {
        missing.add(name);
        return `[${name}]`;
      }
      return escapeHtml(format === 'number' ? formatNumber(value) : String(value));
    },
  );

  return { content, missing: [...missing] };
}

function formatNumber(value: unknown): string {
  const numeric = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(numeric) ? NUMBER_FORMAT.format(numeric) : String(value);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
