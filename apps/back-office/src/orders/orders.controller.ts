import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { Actor, CheckoutDto, CreateOrderDto, OrderQueryDto } from '@app/common';
import { OrdersService } from './orders.service';

@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  async create(@Body() dto: CreateOrderDto, @Actor() actorId?: string) {
    return this.ordersService.create(dto, actorId);
  }

  @Post('checkout')
  async checkout(@Body() dto: CheckoutDto, @Actor() actorId?: string) {
    return this.ordersService.checkout(dto, actorId);
  }

  @Get()
  async findAll(@Query() query: OrderQueryDto) {
    return this.ordersService.findAll(query);
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.ordersService.findOne(id);
  }

  @Post(':id/complete')
  @HttpCode(200)
  async complete(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    return this.ordersService.complete(id, actorId);
  }

  @Post(':id/cancel')
  @HttpCode(200)
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    return this.ordersService.cancel(id, actorId);
  }
}
