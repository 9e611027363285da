import { describe, test, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('KeyedMutex', () => {
  test('given concurrent sections on one key, should run them one at a time in call order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all(
      ['a', 'b', 'c'].map((name) =>
        mutex.run('status-bar', async () => {
          events.push(`start:${name}`);
          await tick();
          events.push(`end:${name}`);
        }),
      ),
    );

    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  });

  test('given different keys, should not serialize them', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.run('one', async () => {
        events.push('start:one');
        await tick();
        events.push('end:one');
      }),
      mutex.run('two', async () => {
        events.push('start:two');
        await tick();
        events.push('end:two');
      }),
    ]);

    expect(events.slice(0, 2)).toEqual(['start:one', 'start:two']);
  });

  test('given a failing section, should reject it and still run the next one', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run('k', async () => {
      throw new Error('write failed');
    });
    const next = mutex.run('k', async () => 'ok');

    await expect(failing).rejects.toThrow('write failed');
    await expect(next).resolves.toBe('ok');
    expect(mutex.size).toBe(0);
  });
});
