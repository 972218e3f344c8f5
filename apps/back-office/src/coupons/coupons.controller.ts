import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
} from '@nestjs/common';
import {
  Actor,
  CreateCouponDto,
  QuoteCouponDto,
  UpdateCouponDto,
} from '@app/common';
import { CouponsService } from './coupons.service';

@Controller('coupons')
export class CouponsController {
  constructor(private readonly couponsService: CouponsService) {}

  @Post()
  async create(@Body() dto: CreateCouponDto, @Actor() actorId?: string) {
    return this.couponsService.create(dto, actorId);
  }

  @Post('quote')
  @HttpCode(200)
  async quote(@Body() dto: QuoteCouponDto) {
    return this.couponsService.quote(dto);
  }

  @Get()
  async findAll() {
    return this.couponsService.findAll();
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.couponsService.findOne(id);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateCouponDto,
    @Actor() actorId?: string,
  ) {
    return this.couponsService.update(id, dto, actorId);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    await this.couponsService.remove(id, actorId);
  }
}
