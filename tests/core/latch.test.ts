import { describe, it, expect } from 'vitest';
import { Latch } from '../../src/index.js';

describe('Latch', () => {
  it('releases every waiter on countDown()', async () => {
    const latch = new Latch();
    const released: number[] = [];

    void latch.wait().then(() => released.push(1));
    void latch.wait().then(() => released.push(2));
    expect(latch.isReleased).toBe(false);

    latch.countDown();
    await latch.wait();

    expect(latch.isReleased).toBe(true);
    expect(released).toEqual([1, 2]);
  });

  it('resolves waits that start after the release', async () => {
    const latch = new Latch();
    latch.countDown();
    latch.countDown();

    await expect(latch.wait()).resolves.toBeUndefined();
  });
});
