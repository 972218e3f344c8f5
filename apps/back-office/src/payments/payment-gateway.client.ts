import { HttpService } from '@nestjs/axios';
import {
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { catchError, firstValueFrom, retry, timeout } from 'rxjs';
import { PaymentStatus } from '@app/common';
import { CircuitBreakerService } from '../circuit-breaker/circuit-breaker.service';

export interface GatewayPaymentStatus {
  reference: string;
  status: PaymentStatus;
  transactionId?: string;
  message?: string;
}

const ATTEMPT_TIMEOUT = 5000;
const RETRIES = 2;

const HTTP_CONFIG = {
  timeout: ATTEMPT_TIMEOUT,
  maxRedirects: 3,
  validateStatus: (status: number) => status < 500,
};

export const GATEWAY_BREAKER = 'payment-gateway';
// room for every retry before the breaker gives up on the call
export const GATEWAY_BREAKER_TIMEOUT = ATTEMPT_TIMEOUT * (RETRIES + 1) + 1000;

@Injectable()
export class PaymentGatewayClient {
  private readonly logger = new Logger(PaymentGatewayClient.name);
  private readonly baseUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly circuitBreakerService: CircuitBreakerService,
    configService: ConfigService,
  ) {
    this.baseUrl = configService.get<string>(
      'paymentGateway.url',
      'http://localhost:3002',
    );
    this.circuitBreakerService.createBreaker(GATEWAY_BREAKER, {
      timeout: GATEWAY_BREAKER_TIMEOUT,
    });
  }

  async fetchStatus(reference: string): Promise<GatewayPaymentStatus> {
    try {
      const response = await this.circuitBreakerService.fire(GATEWAY_BREAKER, () =>
        firstValueFrom(
          this.httpService
            .get<GatewayPaymentStatus>(
              `${this.baseUrl}/payments/${encodeURIComponent(reference)}`,
              { ...HTTP_CONFIG },
            )
            .pipe(
              timeout(ATTEMPT_TIMEOUT),
              retry(RETRIES),
              catchError((error: unknown) => {
                this.logger.error(`Gateway status lookup failed: ${String(error)}`);
                throw error;
              }),
            ),
        ),
      );

      if (response.status >= 400) {
        throw new ServiceUnavailableException(
          `Gateway answered ${response.status} for payment ${reference}`,
        );
      }
      return response.data;
    } catch (error) {
      if (error instanceof ServiceUnavailableException) {
        throw error;
      }
      if (this.circuitBreakerService.getState(GATEWAY_BREAKER) === 'OPEN') {
        this.logger.warn('Circuit breaker is open - payment gateway unreachable');
      }
      throw new ServiceUnavailableException(
        'Payment gateway is currently unavailable, please try again later',
      );
    }
  }
}
