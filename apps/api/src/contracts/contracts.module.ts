import { Module } from '@nestjs/common';
import { TemplatesModule } from '../templates/templates.module';
import { ContractsController } from './contracts.controller';
import { ContractsService } from './contracts.service';
import { ContractsRepository } from './repositories/contracts.repository';
import { TypeOrmContractsRepository } from './repositories/typeorm-contracts.repository';

@Module({
  imports: [TemplatesModule],
  controllers: [ContractsController],
  providers: [
    ContractsService,
    { provide: ContractsRepository, useClass: TypeOrmContractsRepository },
  ],
  exports: [ContractsService],
})
export class ContractsModule {}
