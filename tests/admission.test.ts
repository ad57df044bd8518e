import { AdmissionController } from '../src/lib/admission';
import { ConfigError } from '../src/lib/errors';
import { MemoryStore } from '../src/stores/memoryStore';

function controller(options: { capacity: number; refillRate: number; refillInterval: number }) {
  let now = 0;
  const admission = new AdmissionController({ ...options, now: () => now });
  return {
    admission,
    advance: (ms: number) => {
      now += ms;
    },
    setTime: (ms: number) => {
      now = ms;
    },
  };
}

describe('AdmissionController', () => {
  test('allows exactly capacity calls when no time passes', () => {
    const { admission } = controller({ capacity: 3, refillRate: 1, refillInterval: 1000 });

    const results = [1, 2, 3, 4].map(() => admission.allow('client'));

    expect(results).toEqual([true, true, true, false]);
  });

  test('adds refillRate tokens per interval', () => {
    const { admission, advance } = controller({ capacity: 5, refillRate: 2, refillInterval: 1000 });
    for (let i = 0; i < 5; i++) expect(admission.allow('client')).toBe(true);
    expect(admission.allow('client')).toBe(false);

    advance(1000);

    expect([admission.allow('client'), admission.allow('client'), admission.allow('client')]).toEqual([
      true,
      true,
      false,
    ]);
  });

  test('never refills beyond capacity', () => {
    const { admission, advance } = controller({ capacity: 2, refillRate: 1, refillInterval: 100 });
    admission.allow('client');

    advance(10_000);

    expect([admission.allow('client'), admission.allow('client'), admission.allow('client')]).toEqual([
      true,
      true,
      false,
    ]);
  });

  test('a rejected call keeps the partial refill', () => {
    const { admission, advance } = controller({ capacity: 1, refillRate: 1, refillInterval: 1000 });
    expect(admission.allow('client')).toBe(true);

    advance(500);
    expect(admission.allow('client')).toBe(false);

    advance(500);
    expect(admission.allow('client')).toBe(true);
  });

  test('a clock stepping backwards adds no tokens', () => {
    const { admission, setTime } = controller({ capacity: 2, refillRate: 1, refillInterval: 1000 });
    setTime(1000);
    admission.allow('client');
    admission.allow('client');

    setTime(500);
    expect(admission.allow('client')).toBe(false);

    setTime(2000);
    expect(admission.allow('client')).toBe(true);
    expect(admission.allow('client')).toBe(false);
  });

  test('keeps one bucket per key', () => {
    const { admission } = controller({ capacity: 1, refillRate: 1, refillInterval: 1000 });

    expect(admission.allow('a')).toBe(true);
    expect(admission.allow('a')).toBe(false);
    expect(admission.allow('b')).toBe(true);
  });

  test('admit returns the bucket as it stands after the decision', () => {
    const { admission } = controller({ capacity: 2, refillRate: 1, refillInterval: 1000 });

    expect(admission.admit('client')).toEqual({ allowed: true, tokens: 1, capacity: 2, retryAfterMs: 0 });
    expect(admission.admit('client')).toEqual({ allowed: true, tokens: 0, capacity: 2, retryAfterMs: 1000 });
    expect(admission.admit('client')).toEqual({ allowed: false, tokens: 0, capacity: 2, retryAfterMs: 1000 });
  });

  test('inspect reports tokens and wait time without consuming', () => {
    const { admission, advance } = controller({ capacity: 1, refillRate: 1, refillInterval: 1000 });
    admission.allow('client');
    advance(250);

    expect(admission.inspect('client')).toEqual({ tokens: 0.25, capacity: 1, retryAfterMs: 750 });
    expect(admission.inspect('other')).toEqual({ tokens: 1, capacity: 1, retryAfterMs: 0 });
  });

  test('reset restores a full bucket', () => {
    const { admission } = controller({ capacity: 1, refillRate: 1, refillInterval: 60_000 });
    admission.allow('client');
    expect(admission.allow('client')).toBe(false);

    admission.reset('client');

    expect(admission.allow('client')).toBe(true);
  });

  test('instances with their own stores are independent', () => {
    const a = new AdmissionController({ capacity: 1, refillRate: 1, refillInterval: 60_000 });
    const b = new AdmissionController({ capacity: 1, refillRate: 1, refillInterval: 60_000 });

    expect(a.allow('client')).toBe(true);
    expect(a.allow('client')).toBe(false);
    expect(b.allow('client')).toBe(true);
  });

  test('instances sharing an injected store share buckets', () => {
    const store = new MemoryStore();
    const now = () => 0;
    const a = new AdmissionController({ capacity: 1, refillRate: 1, refillInterval: 60_000, store, now });
    const b = new AdmissionController({ capacity: 1, refillRate: 1, refillInterval: 60_000, store, now });

    expect(a.allow('client')).toBe(true);
    expect(b.allow('client')).toBe(false);
  });

  test('drops buckets once they would be full again', () => {
    const store = new MemoryStore();
    let now = 0;
    const admission = new AdmissionController({ capacity: 2, refillRate: 1, refillInterval: 1000, store, now: () => now });
    admission.allow('client');
    expect(store.size.buckets).toBe(1);

    now = 1000;
    expect(store.sweep(now)).toBe(1);
    expect(store.size.buckets).toBe(0);
    expect(admission.inspect('client').tokens).toBe(2);
  });

  test('rejects invalid configuration', () => {
    expect(() => new AdmissionController({ capacity: 0, refillRate: 1, refillInterval: 1000 })).toThrow(ConfigError);
    expect(() => new AdmissionController({ capacity: 1, refillRate: -1, refillInterval: 1000 })).toThrow(
      'refillRate must be a positive number, got -1',
    );
    expect(() => new AdmissionController({ capacity: 1, refillRate: 1, refillInterval: Number.NaN })).toThrow(
      ConfigError,
    );
  });
});
