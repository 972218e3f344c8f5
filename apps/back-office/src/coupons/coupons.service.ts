import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import {
  CreateCouponDto,
  QuoteCouponDto,
  UpdateCouponDto,
  applyDiscount,
  discountAmount,
  roundMoney,
} from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { Coupon, isCouponValid } from './coupon.entity';

export interface CouponQuote {
  code: string;
  discountPercent: number;
  amount: number;
  discount: number;
  total: number;
}

@Injectable()
export class CouponsService {
  constructor(
    @InjectRepository(Coupon)
    private readonly couponRepository: Repository<Coupon>,
    private readonly auditLogService: AuditLogService,
  ) {}

  async create(dto: CreateCouponDto, actorId?: string): Promise<Coupon> {
    const code = dto.code.toUpperCase();
    this.assertWindow(dto.validFrom, dto.validTo);
    const taken = await this.couponRepository.exists({
      where: { code },
      withDeleted: true,
    });
    if (taken) {
      throw new ConflictException(`Coupon ${code} already exists`);
    }

    const coupon = await this.couponRepository.save(
      this.couponRepository.create({
        code,
        discountPercent: dto.discountPercent,
        validFrom: dto.validFrom,
        validTo: dto.validTo,
        isActive: dto.isActive ?? true,
      }),
    );
    await this.auditLogService.record({
      actorId,
      action: 'create',
      entityType: 'coupon',
      entityId: coupon.id,
      changes: { code, discountPercent: coupon.discountPercent },
    });
    return coupon;
  }

  async findAll(): Promise<Coupon[]> {
    return this.couponRepository.find({ order: { code: 'ASC' } });
  }

  async findOne(id: string): Promise<Coupon> {
    const coupon = await this.couponRepository.findOneBy({ id });
    if (!coupon) {
      throw new NotFoundException(`Coupon ${id} not found`);
    }
    return coupon;
  }

  async update(id: string, dto: UpdateCouponDto, actorId?: string): Promise<Coupon> {
    const coupon = await this.findOne(id);
    this.assertWindow(dto.validFrom ?? coupon.validFrom, dto.validTo ?? coupon.validTo);

    Object.assign(coupon, dto);
    const saved = await this.couponRepository.save(coupon);
    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'coupon',
      entityId: id,
      changes: { ...dto },
    });
    return saved;
  }

  async remove(id: string, actorId?: string): Promise<void> {
    await this.findOne(id);
    await this.couponRepository.softDelete(id);
    await this.auditLogService.record({
      actorId,
      action: 'delete',
      entityType: 'coupon',
      entityId: id,
    });
  }

  /** Resolves a code usable right now, or explains why it cannot be used. */
  async findValidByCode(
    code: string,
    at: Date = new Date(),
    manager?: EntityManager,
  ): Promise<Coupon> {
    const repository = manager ? manager.getRepository(Coupon) : this.couponRepository;
    const coupon = await repository.findOneBy({ code: code.trim().toUpperCase() });
    if (!coupon) {
      throw new BadRequestException(`Coupon ${code} does not exist`);
    }
    if (!isCouponValid(coupon, at)) {
      throw new BadRequestException(
        coupon.isActive
          ? `Coupon ${coupon.code} is not valid at ${at.toISOString()}`
          : `Coupon ${coupon.code} is inactive`,
      );
    }
    return coupon;
  }

  async quote(dto: QuoteCouponDto, at: Date = new Date()): Promise<CouponQuote> {
    const coupon = await this.findValidByCode(dto.code, at);
    const amount = roundMoney(dto.amount);
    return {
      code: coupon.code,
      discountPercent: coupon.discountPercent,
      amount,
      discount: discountAmount(amount, coupon.discountPercent),
      total: applyDiscount(amount, coupon.discountPercent),
    };
  }

  private assertWindow(validFrom: Date, validTo: Date): void {
    if (validFrom.getTime() >= validTo.getTime()) {
      throw new BadRequestException('validFrom must be before validTo');
    }
  }
}
