import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  AdjustLoyaltyPointsDto,
  CreateUserDto,
  UpdateUserDto,
  UserQueryDto,
} from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { User } from './user.entity';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly auditLogService: AuditLogService,
  ) {}

  async create(dto: CreateUserDto, actorId?: string): Promise<User> {
    await this.assertUnique(dto.username, dto.email);

    const user = this.userRepository.create({
      ...dto,
      email: dto.email.toLowerCase(),
    });
    const saved = await this.userRepository.save(user);

    await this.auditLogService.record({
      actorId,
      action: 'create',
      entityType: 'user',
      entityId: saved.id,
      changes: { username: saved.username, role: saved.role },
    });
    this.logger.log(`Created user ${saved.displayName}`);
    return saved;
  }

  async findAll(query: UserQueryDto = {}): Promise<User[]> {
    return this.userRepository.find({
      where: query.role ? { role: query.role } : {},
      order: { username: 'ASC' },
    });
  }

  async findOne(id: string): Promise<User> {
    const user = await this.userRepository.findOneBy({ id });
    if (!user) {
      throw new NotFoundException(`User ${id} not found`);
    }
    return user;
  }

  async update(id: string, dto: UpdateUserDto, actorId?: string): Promise<User> {
    const user = await this.findOne(id);
    if (dto.email && dto.email.toLowerCase() !== user.email) {
      await this.assertUnique(undefined, dto.email);
    }

    Object.assign(user, dto, dto.email ? { email: dto.email.toLowerCase() } : {});
    const saved = await this.userRepository.save(user);

    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'user',
      entityId: id,
      changes: { ...dto },
    });
    return saved;
  }

  async remove(id: string, actorId?: string): Promise<void> {
    const user = await this.findOne(id);
    await this.userRepository.softDelete(user.id);

    await this.auditLogService.record({
      actorId,
      action: 'delete',
      entityType: 'user',
      entityId: id,
    });
    this.logger.log(`Soft-deleted user ${user.displayName}`);
  }

  async adjustLoyaltyPoints(
    id: string,
    dto: AdjustLoyaltyPointsDto,
    actorId?: string,
  ): Promise<User> {
    const user = await this.findOne(id);
    const next = user.loyaltyPoints + dto.delta;
    if (next < 0) {
      throw new BadRequestException(
        `User ${user.username} has only ${user.loyaltyPoints} loyalty points`,
      );
    }

    user.loyaltyPoints = next;
    const saved = await this.userRepository.save(user);

    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'user',
      entityId: id,
      changes: { loyaltyPoints: { from: next - dto.delta, to: next } },
    });
    return saved;
  }

  private async assertUnique(username?: string, email?: string): Promise<void> {
    // withDeleted: soft-deleted rows still hold the unique index
    if (username) {
      const taken = await this.userRepository.exists({
        where: { username },
        withDeleted: true,
      });
      if (taken) {
        throw new ConflictException(`Username ${username} is already taken`);
      }
    }
    if (email) {
      const taken = await this.userRepository.exists({
        where: { email: email.toLowerCase() },
        withDeleted: true,
      });
      if (taken) {
        throw new ConflictException(`Email ${email} is already registered`);
      }
    }
  }
}
