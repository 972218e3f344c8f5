import { Controller, Get, Query } from '@nestjs/common';
import { AuditLogQueryDto } from '@app/common';
import { AuditLogService } from './audit-log.service';

@Controller('audit-logs')
export class AuditController {
  constructor(private readonly auditLogService: AuditLogService) {}

  @Get()
  async findAll(@Query() query: AuditLogQueryDto) {
    return this.auditLogService.findAll(query);
  }
}
