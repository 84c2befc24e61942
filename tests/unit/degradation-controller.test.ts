import { DegradationController } from '../../src/resilience/degradation-controller';
import { DependencyHealthManager } from '../../src/resilience/dependency-health';

const policy = { timeoutMs: 30, retries: 1, retryDelayMs: 0 };

describe('DegradationController', () => {
  it('should return the value of a successful call', async () => {
    const controller = new DegradationController(policy);
    expect(await controller.invoke('catalog', async () => 42)).toEqual({ ok: true, value: 42, attempts: 1 });
  });

  it('should retry once after a failure', async () => {
    const controller = new DegradationController(policy);
    let calls = 0;

    const outcome = await controller.invoke('orders', async () => {
      calls++;
      if (calls === 1) throw new Error('flaky');
      return 'ok';
    });

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 2 });
  });

  it('should degrade after two timeouts, within the combined budget', async () => {
    const controller = new DegradationController(policy);
    const started = Date.now();

    const outcome = await controller.invoke('vision', () => new Promise<string>(() => undefined));

    expect(outcome).toMatchObject({ ok: false, reason: 'timeout', attempts: 2 });
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('should report upstream errors as degraded, never throw', async () => {
    const controller = new DegradationController(policy);

    const outcome = await controller.invoke('generation', async () => {
      throw new Error('503 from provider');
    });

    expect(outcome).toEqual({ ok: false, reason: 'upstream_error', attempts: 2, error: '503 from provider' });
  });

  it('should short-circuit once the circuit opens and probe again after the reset window', async () => {
    let clock = 0;
    const health = new DependencyHealthManager(2, 1000, () => clock);
    const controller = new DegradationController(policy, health);
    const failing = async (): Promise<string> => {
      throw new Error('down');
    };

    await controller.invoke('retrieval', failing);
    await controller.invoke('retrieval', failing);
    expect(health.getStatus('retrieval')?.circuitOpen).toBe(true);

    let calls = 0;
    const skipped = await controller.invoke('retrieval', async () => {
      calls++;
      return 'x';
    });
    expect(skipped).toEqual({ ok: false, reason: 'circuit_open', attempts: 0 });
    expect(calls).toBe(0);

    clock = 1001;
    const probe = await controller.invoke('retrieval', async () => 'back');
    expect(probe).toEqual({ ok: true, value: 'back', attempts: 1 });
    expect(health.getStatus('retrieval')?.status).toBe('healthy');
  });

  it('should report the degradation level across dependencies', () => {
    const health = new DependencyHealthManager(1, 1000, () => 0);
    expect(health.getDegradationLevel()).toBe('none');

    health.recordFailure('vision', 'x');
    expect(health.getDegradationLevel()).toBe('partial');

    health.recordFailure('media', 'x');
    health.recordFailure('generation', 'x');
    expect(health.getDegradationLevel()).toBe('full');
  });
});
