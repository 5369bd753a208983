import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditService } from './audit.service';
import { AuditController } from './audit.controller';
import { AuditEventEntity } from './infrastructure/persistence/relational/entities/audit-event.entity';
import { AuditEventRepository } from './domain/repositories/audit-event.repository.port';
import { AuditEventRelationalRepository } from './infrastructure/persistence/relational/repositories/audit-event.repository';

@Module({
  imports: [TypeOrmModule.forFeature([AuditEventEntity])],
  providers: [
    {
      provide: AuditEventRepository,
      useClass: AuditEventRelationalRepository,
    },
    AuditService,
  ],
  controllers: [AuditController],
  exports: [AuditService],
})
export class AuditModule {}
