import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@clm/database';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { JobsModule } from './jobs/jobs.module';
import { TemplatesModule } from './templates/templates.module';
import { ContractsModule } from './contracts/contracts.module';
import { AiModule } from './ai/ai.module';
import { DocumentsModule } from './documents/documents.module';
import { AuditModule } from './audit/audit.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: Number(configService.get<number | string>('POSTGRES_PORT', 5432)),
        username: configService.get<string>('POSTGRES_USER', 'clm'),
        password: configService.get<string>('POSTGRES_PASSWORD', 'clm_secret'),
        database: configService.get<string>('POSTGRES_DB', 'clm'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') === 'development',
      }),
    }),

    // ── Shared Database Repositories ─────────────────────
    DatabaseModule.forFeature(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    UsersModule,
    JobsModule,
    TemplatesModule,
    ContractsModule,
    AiModule,
    DocumentsModule,
    AuditModule,
  ],
})
export class AppModule {}
