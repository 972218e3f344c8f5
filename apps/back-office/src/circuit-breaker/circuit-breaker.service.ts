import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';

type Action = (...args: unknown[]) => Promise<unknown>;

@Injectable()
export class CircuitBreakerService implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerService.name);
  private readonly breakers = new Map<string, CircuitBreaker<[Action], unknown>>();

  createBreaker(
    name: string,
    options: CircuitBreaker.Options = {},
  ): CircuitBreaker<[Action], unknown> {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker<[Action], unknown>(
      async (action: Action) => action(),
      {
        timeout: 5000, // slower calls count as failures
        errorThresholdPercentage: 50,
        resetTimeout: 10000,
        rollingCountTimeout: 10000,
        rollingCountBuckets: 10,
        name,
        ...options,
      },
    );

    breaker.on('open', () => {
      this.logger.warn(`Circuit Breaker '${name}' is open`);
    });
    breaker.on('close', () => {
      this.logger.log(`Circuit Breaker '${name}' is closed`);
    });
    breaker.on('halfOpen', () => {
      this.logger.log(`Circuit Breaker '${name}' is half open`);
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  async fire<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const breaker = this.createBreaker(name);
    // the shared action erases the result type; fn decides it
    return (await breaker.fire(fn)) as T;
  }

  getState(name: string): 'OPEN' | 'HALF_OPEN' | 'CLOSED' | 'UNKNOWN' {
    const breaker = this.breakers.get(name);
    if (!breaker) return 'UNKNOWN';
    if (breaker.opened) return 'OPEN';
    if (breaker.halfOpen) return 'HALF_OPEN';
    return 'CLOSED';
  }

  onModuleDestroy(): void {
    this.shutdown();
  }

  shutdown(): void {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
    this.breakers.clear();
  }
}
