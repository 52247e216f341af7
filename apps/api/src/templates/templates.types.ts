export interface FormFieldOption {
  value: string;
  label: string;
}

/** One input of a contract type's form. `type` is a UI hint: text, textarea, number, date, select. */
export interface FormField {
  name: string;
  label: string;
  type: string;
  required: boolean;
  options?: FormFieldOption[];
}

export interface ContractTypeDefinition {
  id: string;
  name: string;
  description: string;
  category: string;
  icon: string;
  fields: FormField[];
  /** HTML body with {{field}} / {{field:number}} placeholders */
  body?: string;
}

export interface ContractTemplate {
  id: string;
  name: string;
  description: string;
  category: string;
  jurisdiction: string;
  contractType: string;
}

export interface TemplateCatalogue {
  contractTypes: ContractTypeDefinition[];
  defaultBody: string;
  templates: ContractTemplate[];
}

export type ContractInputs = Record<string, unknown>;
