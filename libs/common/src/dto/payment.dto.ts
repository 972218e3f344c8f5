import {
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';
import {
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
  PaymentMethod,
  PaymentStatus,
} from '../constants/choices';

export class CreatePaymentDto {
  @IsUUID()
  orderId!: string;

  @IsIn(PAYMENT_METHODS)
  method!: PaymentMethod;
}

export class CompletePaymentDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  transactionId?: string;
}

export class FailPaymentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  reason!: string;
}

export class PaymentQueryDto {
  @IsOptional()
  @IsUUID()
  orderId?: string;

  @IsOptional()
  @IsIn(PAYMENT_STATUSES)
  status?: PaymentStatus;
}

/**
 * Body a gateway posts to the webhook endpoint, or publishes on the
 * `payment_callback` queue. Either `reference` or `transactionId` must
 * identify the payment.
 */
export class PaymentWebhookDto {
  @IsString()
  @IsNotEmpty()
  event!: string;

  @IsOptional()
  @IsString()
  reference?: string;

  @IsOptional()
  @IsString()
  transactionId?: string;

  @IsIn(['completed', 'failed'])
  status!: Exclude<PaymentStatus, 'pending'>;

  @IsOptional()
  @IsString()
  message?: string;
}

export class PaymentResponseDto {
  success!: boolean;
  paymentId!: string;
  status!: PaymentStatus;
  transactionId?: string | null;
  message?: string;
}
