import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { isThrottled, THROTTLED, throttle } from '../throttle';

describe('throttle', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('skips calls made inside the interval', async () => {
    const operation = vi.fn(async (_owner: object, value: number) => value * 2);
    const gated = throttle(5000, operation);
    const owner = {};

    expect(await gated(owner, 2)).toBe(4);
    vi.setSystemTime(new Date('2024-01-01T00:00:04.999Z'));
    expect(await gated(owner, 3)).toBe(THROTTLED);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('runs again once the interval has passed', async () => {
    const operation = vi.fn(async (_owner: object, value: number) => value * 2);
    const gated = throttle(5000, operation);
    const owner = {};

    await gated(owner, 1);
    vi.setSystemTime(new Date('2024-01-01T00:00:05Z'));

    expect(await gated(owner, 4)).toBe(8);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('force bypasses the gate and restarts the interval', async () => {
    const operation = vi.fn(async (_owner: object) => 'done');
    const gated = throttle(5000, operation);
    const owner = {};

    await gated(owner);
    vi.setSystemTime(new Date('2024-01-01T00:00:03Z'));
    expect(await gated.force(owner)).toBe('done');

    vi.setSystemTime(new Date('2024-01-01T00:00:07Z'));
    expect(await gated(owner)).toBe(THROTTLED);

    vi.setSystemTime(new Date('2024-01-01T00:00:08Z'));
    expect(await gated(owner)).toBe('done');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('keeps a separate gate per owner', async () => {
    const operation = vi.fn(async (owner: { id: number }) => owner.id);
    const gated = throttle(5000, operation);

    expect(await gated({ id: 1 })).toBe(1);
    expect(await gated({ id: 2 })).toBe(2);
  });

  it('reads the interval from the owner', async () => {
    const operation = vi.fn(async (_owner: { intervalMs: number }) => true);
    const gated = throttle(owner => owner.intervalMs, operation);
    const owner = { intervalMs: 0 };

    await gated(owner);
    expect(await gated(owner)).toBe(true);

    owner.intervalMs = 1000;
    expect(isThrottled(await gated(owner))).toBe(true);
  });
});
