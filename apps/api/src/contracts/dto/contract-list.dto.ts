import { ContractDto } from './contract.dto';

export interface PaginationDto {
  page: number;
  pageSize: number;
  totalPages: number;
  totalItems: number;
}

export class ContractListDto {
  data!: ContractDto[];
  pagination!: PaginationDto;
}
