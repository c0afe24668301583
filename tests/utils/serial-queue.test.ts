import { describe, expect, it } from 'vitest';
import { SerialQueue } from '../../src/utils/serial-queue.js';

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('SerialQueue', () => {
  it('runs one task at a time in push order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const first = deferred<void>();

    const a = queue.run(async () => {
      events.push('a:start');
      await first.promise;
      events.push('a:end');
      return 'a';
    });
    const b = queue.run(async () => {
      events.push('b:start');
      return 'b';
    });

    await Promise.resolve();
    expect(events).toEqual(['a:start']);
    expect(queue.size).toBe(2);

    first.resolve();
    await expect(Promise.all([a, b])).resolves.toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start']);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a task rejects', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });
});
