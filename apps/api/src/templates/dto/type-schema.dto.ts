import type { ContractTypeDefinition, FormField } from '../templates.types';

/** Form schema for one contract type. */
export class TypeSchemaDto {
  type!: string;
  required!: string[];
  fields!: FormField[];

  static fromDefinition(definition: ContractTypeDefinition): TypeSchemaDto {
    const dto = new TypeSchemaDto();
    dto.type = definition.id;
    dto.required = definition.fields.filter((f) => f.required).map((f) => f.name);
    dto.fields = definition.fields;
    return dto;
  }
}

export class ContractTypeSummaryDto {
  id!: string;
  name!: string;
  description!: string;
  category!: string;
  icon!: string;

  static fromDefinition(definition: ContractTypeDefinition): ContractTypeSummaryDto {
    const dto = new ContractTypeSummaryDto();
    dto.id = definition.id;
    dto.name = definition.name;
    dto.description = definition.description;
    dto.category = definition.category;
    dto.icon = definition.icon;
    return dto;
  }
}
