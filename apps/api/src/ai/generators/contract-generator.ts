import type { ContractInputs } from '../../templates/templates.types';

export interface GenerationRequest {
  contractType: string;
  inputs: ContractInputs;
  jurisdiction: string;
}

export interface RevisionRequest {
  contractType: string;
  /** Latest stored content; empty when there is none */
  content: string;
  feedback: string;
  /** Keep the current text and only revise it; otherwise start again from the template */
  preserveStructure: boolean;
  /** Fresh form inputs used when starting again */
  inputs?: ContractInputs;
  jurisdiction: string;
}

export interface GeneratedContract {
  /** HTML body */
  content: string;
  model: string;
  /** Placeholders the inputs did not cover, left as `[name]` in the content */
  missingPlaceholders: string[];
}

/**
 * Produces contract content from form inputs. Bound to
 * TemplateContractGenerator unless a model-backed implementation replaces it.
 */
export abstract class ContractGenerator {
  abstract generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedContract>;

  /** Reworks existing content according to user feedback. */
  abstract revise(request: RevisionRequest, signal?: AbortSignal): Promise<GeneratedContract>;
}
