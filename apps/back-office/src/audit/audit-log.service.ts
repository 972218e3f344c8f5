import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { AuditAction, AuditLogQueryDto } from '@app/common';
import { AdminAuditLog } from './audit-log.entity';

export interface AuditEntry {
  actorId?: string;
  action: AuditAction;
  entityType: string;
  entityId: string;
  changes?: Record<string, unknown>;
}

@Injectable()
export class AuditLogService {
  private readonly logger = new Logger(AuditLogService.name);

  constructor(
    @InjectRepository(AdminAuditLog)
    private readonly auditRepository: Repository<AdminAuditLog>,
  ) {}

  /**
   * Appends an entry. Pass the transaction's manager when the audited change
   * runs inside one, so both commit or roll back together.
   */
  async record(entry: AuditEntry, manager?: EntityManager): Promise<AdminAuditLog> {
    const repository = manager
      ? manager.getRepository(AdminAuditLog)
      : this.auditRepository;
    const log = repository.create({
      actorId: entry.actorId ?? null,
      action: entry.action,
      entityType: entry.entityType,
      entityId: entry.entityId,
      changes: entry.changes ?? null,
    });
    const saved = await repository.save(log);
    this.logger.debug(
      `${entry.action} ${entry.entityType}#${entry.entityId} by ${entry.actorId ?? 'system'}`,
    );
    return saved;
  }

  async findAll(query: AuditLogQueryDto = {}): Promise<AdminAuditLog[]> {
    const where: FindOptionsWhere<AdminAuditLog> = {};
    if (query.entityType) where.entityType = query.entityType;
    if (query.entityId) where.entityId = query.entityId;
    if (query.actorId) where.actorId = query.actorId;

    return this.auditRepository.find({
      where,
      order: { createdAt: 'DESC' },
    });
  }
}
