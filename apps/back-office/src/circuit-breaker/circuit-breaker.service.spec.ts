import { CircuitBreakerService } from './circuit-breaker.service';

describe('CircuitBreakerService', () => {
  let service: CircuitBreakerService;

  beforeEach(() => {
    service = new CircuitBreakerService();
  });

  afterEach(() => {
    service.shutdown();
  });

  it('passes the action result through', async () => {
    await expect(service.fire('gateway', async () => 42)).resolves.toBe(42);
    expect(service.getState('gateway')).toBe('CLOSED');
  });

  it('reuses one breaker per name', () => {
    expect(service.createBreaker('gateway')).toBe(service.createBreaker('gateway'));
    expect(service.getState('other')).toBe('UNKNOWN');
  });

  it('opens after failures and then rejects without calling the action', async () => {
    service.createBreaker('flaky', { volumeThreshold: 1 });
    const action = jest.fn(async () => {
      throw new Error('gateway down');
    });

    await expect(service.fire('flaky', action)).rejects.toThrow('gateway down');
    expect(service.getState('flaky')).toBe('OPEN');

    await expect(service.fire('flaky', action)).rejects.toThrow('Breaker is open');
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('fails a call that outlives the breaker timeout', async () => {
    service.createBreaker('slow', { timeout: 20 });
    let timer: NodeJS.Timeout | undefined;
    const slow = () =>
      new Promise<string>((resolve) => {
        timer = setTimeout(() => resolve('late'), 200);
      });

    await expect(service.fire('slow', slow)).rejects.toThrow('Timed out after 20ms');
    clearTimeout(timer);
  });
});
