import { describe, expect, it } from 'vitest';
import { createSerialQueue } from '../serial-queue.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('createSerialQueue', () => {
  it('runs tasks one after another in submission order', async () => {
    const queue = createSerialQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(task('a', 15)), queue.run(task('b', 1)), queue.run(task('c', 5))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('passes a failure to its caller and keeps running later tasks', async () => {
    const queue = createSerialQueue();

    const failing = queue.run(async () => {
      throw new Error('disk full');
    });
    const following = queue.run(async () => 'still running');

    await expect(failing).rejects.toThrow('disk full');
    await expect(following).resolves.toBe('still running');
  });
});
