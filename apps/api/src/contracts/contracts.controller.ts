import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { FirebaseAuthGuard, CurrentUser } from '../auth';
import type { RequestUser } from '../auth';
import { ContractsService } from './contracts.service';
import { CreateContractDto } from './dto/create-contract.dto';
import { UpdateContractDto } from './dto/update-contract.dto';
import { UpdateContentDto } from './dto/update-content.dto';
import { UpdateStatusDto } from './dto/update-status.dto';
import { ListContractsQueryDto } from './dto/list-contracts-query.dto';
import { ContractDetailDto, ContractDto } from './dto/contract.dto';
import { ContractListDto } from './dto/contract-list.dto';
import { ContractVersionDto } from './dto/contract-version.dto';
import { ContractHistoryEntryDto } from './dto/contract-history-entry.dto';
import { TransitionsDto } from './dto/transitions.dto';
import { ContractStatsDto } from './dto/contract-stats.dto';
import { AddPartyDto } from './dto/add-party.dto';
import { ContractPartyDto } from './dto/contract-party.dto';

/**
 * REST controller for contracts. Callers only ever see their own contracts.
 *
 * Routes:
 *   POST   /contracts                   - create (DRAFT)
 *   GET    /contracts                   - list (status, search, page, pageSize)
 *   GET    /contracts/stats             - dashboard counters
 *   GET    /contracts/recent            - ten most recently updated
 *   GET    /contracts/pending           - non-terminal contracts
 *   GET    /contracts/:id               - detail with latest content
 *   PATCH  /contracts/:id               - update title
 *   DELETE /contracts/:id               - soft delete
 *   POST   /contracts/:id/duplicate     - copy as a new DRAFT
 *   PATCH  /contracts/:id/content       - save a new content version
 *   GET    /contracts/:id/versions      - content versions, oldest first
 *   GET    /contracts/:id/transitions   - statuses reachable from the current one
 *   PATCH  /contracts/:id/status        - apply a transition
 *   GET    /contracts/:id/history       - transitions, oldest first
 *   GET    /contracts/:id/parties       - signers and witnesses
 *   POST   /contracts/:id/parties       - add a party
 *   DELETE /contracts/:id/parties/:partyId - remove a party that has not signed
 *
 * Error responses:
 *   400 - invalid body, illegal transition, cancellation without reason
 *   401 - missing or invalid token
 *   404 - unknown contract (or not the caller's), unknown party
 *   409 - lost a concurrent update, the status forbids the edit,
 *         duplicate party email, or removal of a signed party
 */
@Controller('contracts')
@UseGuards(FirebaseAuthGuard)
export class ContractsController {
  constructor(private readonly contractsService: ContractsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  create(
    @Body() dto: CreateContractDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractDto> {
    return this.contractsService.create(user.userId, dto);
  }

  @Get()
  list(
    @Query() query: ListContractsQueryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractListDto> {
    return this.contractsService.list(user.userId, query);
  }

  @Get('stats')
  stats(@CurrentUser() user: RequestUser): Promise<ContractStatsDto> {
    return this.contractsService.stats(user.userId);
  }

  @Get('recent')
  recent(@CurrentUser() user: RequestUser): Promise<ContractDto[]> {
    return this.contractsService.recent(user.userId);
  }

  @Get('pending')
  pending(@CurrentUser() user: RequestUser): Promise<ContractDto[]> {
    return this.contractsService.pending(user.userId);
  }

  @Get(':id')
  get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractDetailDto> {
    return this.contractsService.getDetail(id, user.userId);
  }

  @Patch(':id')
  update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateContractDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractDto> {
    return this.contractsService.update(id, user.userId, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    return this.contractsService.remove(id, user.userId);
  }

  @Post(':id/duplicate')
  @HttpCode(HttpStatus.CREATED)
  duplicate(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractDto> {
    return this.contractsService.duplicate(id, user.userId);
  }

  @Patch(':id/content')
  updateContent(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateContentDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractVersionDto> {
    return this.contractsService.updateContent(id, user.userId, dto);
  }

  @Get(':id/versions')
  versions(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractVersionDto[]> {
    return this.contractsService.listVersions(id, user.userId);
  }

  @Get(':id/transitions')
  transitions(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<TransitionsDto> {
    return this.contractsService.validTransitions(id, user.userId);
  }

  @Patch(':id/status')
  async updateStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateStatusDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractDto> {
    const { contract } = await this.contractsService.transition(
      id,
      dto.status,
      user.userId,
      { reason: dto.reason },
    );
    return ContractDto.fromEntity(contract);
  }

  @Get(':id/history')
  history(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractHistoryEntryDto[]> {
    return this.contractsService.history(id, user.userId);
  }

  @Get(':id/parties')
  parties(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractPartyDto[]> {
    return this.contractsService.listParties(id, user.userId);
  }

  @Post(':id/parties')
  @HttpCode(HttpStatus.CREATED)
  addParty(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AddPartyDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ContractPartyDto> {
    return this.contractsService.addParty(id, user.userId, dto);
  }

  @Delete(':id/parties/:partyId')
  @HttpCode(HttpStatus.NO_CONTENT)
  removeParty(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('partyId', ParseUUIDPipe) partyId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    return this.contractsService.removeParty(id, partyId, user.userId);
  }
}
