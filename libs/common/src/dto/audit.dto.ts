import { IsOptional, IsString, MaxLength } from 'class-validator';

export class AuditLogQueryDto {
  @IsOptional()
  @IsString()
  entityType?: string;

  @IsOptional()
  @IsString()
  entityId?: string;

  @IsOptional()
  @IsString()
  @MaxLength(36)
  actorId?: string;
}
