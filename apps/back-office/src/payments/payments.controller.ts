import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { EventPattern, Payload } from '@nestjs/microservices';
import {
  Actor,
  CompletePaymentDto,
  CreatePaymentDto,
  FailPaymentDto,
  PAYMENT_PATTERNS,
  PaymentQueryDto,
} from '@app/common';
import { PaymentsService } from './payments.service';

@Controller('payments')
export class PaymentsController {
  private readonly logger = new Logger(PaymentsController.name);

  constructor(private readonly paymentsService: PaymentsService) {}

  @Post()
  async create(@Body() dto: CreatePaymentDto, @Actor() actorId?: string) {
    return this.paymentsService.create(dto, actorId);
  }

  @Get()
  async findAll(@Query() query: PaymentQueryDto) {
    return this.paymentsService.findAll(query);
  }

  @Get('webhook-logs')
  async webhookLogs(@Query('provider') provider?: string) {
    return this.paymentsService.listWebhookLogs(provider);
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.paymentsService.findOne(id);
  }

  @Post(':id/complete')
  @HttpCode(200)
  async complete(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CompletePaymentDto,
    @Actor() actorId?: string,
  ) {
    return this.paymentsService.complete(id, dto.transactionId, actorId);
  }

  @Post(':id/fail')
  @HttpCode(200)
  async fail(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: FailPaymentDto,
    @Actor() actorId?: string,
  ) {
    return this.paymentsService.fail(id, dto.reason, actorId);
  }

  @Post(':id/sync')
  @HttpCode(200)
  async syncWithGateway(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    return this.paymentsService.syncWithGateway(id, actorId);
  }

  // raw body: the log keeps whatever the gateway sent
  @Post('webhook/:provider')
  @HttpCode(200)
  async webhook(
    @Param('provider') provider: string,
    @Body() body: Record<string, unknown>,
  ) {
    const log = await this.paymentsService.handleWebhook(provider, body);
    return { received: true, processed: log.processed, logId: log.id };
  }

  @EventPattern(PAYMENT_PATTERNS.PAYMENT_CALLBACK)
  async handlePaymentCallback(@Payload() data: unknown) {
    try {
      await this.paymentsService.handleWebhook('queue', data);
    } catch (error) {
      // nobody to answer on the queue; the webhook log keeps the message
      if (error instanceof BadRequestException) {
        this.logger.warn(`Dropped payment callback: ${error.message}`);
        return;
      }
      throw error;
    }
  }
}
