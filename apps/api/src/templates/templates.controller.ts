import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';
import { OptionalAuthGuard, OptionalUser } from '../auth';
import type { RequestUser } from '../auth';
import { TemplatesService } from './templates.service';
import type { ContractTemplate } from './templates.types';
import { ListTemplatesQueryDto } from './dto/list-templates-query.dto';
import { ContractTypeSummaryDto, TypeSchemaDto } from './dto/type-schema.dto';

/**
 * Routes (authentication optional):
 *   GET /templates                      - list templates (category, jurisdiction filters)
 *   GET /templates/types                - list contract types
 *   GET /templates/types/:type/schema   - form schema for a type
 *   GET /templates/:templateId          - one template
 */
@Controller('templates')
@UseGuards(OptionalAuthGuard)
export class TemplatesController {
  constructor(private readonly templatesService: TemplatesService) {}

  @Get()
  listTemplates(
    @Query() query: ListTemplatesQueryDto,
    @OptionalUser() user: RequestUser | null,
  ): ContractTemplate[] {
    return this.templatesService.listTemplates(query, user?.userId ?? null);
  }

  @Get('types')
  listTypes(): ContractTypeSummaryDto[] {
    return this.templatesService
      .listContractTypes()
      .map((definition) => ContractTypeSummaryDto.fromDefinition(definition));
  }

  @Get('types/:type/schema')
  getTypeSchema(@Param('type') type: string): TypeSchemaDto {
    return TypeSchemaDto.fromDefinition(this.templatesService.getContractType(type));
  }

  @Get(':templateId')
  getTemplate(@Param('templateId') templateId: string): ContractTemplate {
    return this.templatesService.getTemplate(templateId);
  }
}
