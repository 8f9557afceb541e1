import { describe, it, expect } from 'vitest';
import { SerialLane } from '../../src/application/serial-lane.js';

describe('SerialLane', () => {
  it('runs tasks one after another in submission order', async () => {
    const lane = new SerialLane();
    const order: string[] = [];

    const slow = lane.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push('slow');
      return 1;
    });
    const fast = lane.run(() => {
      order.push('fast');
      return 2;
    });

    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(order).toEqual(['slow', 'fast']);
  });

  it('a failing task rejects its own promise and the lane keeps going', async () => {
    const lane = new SerialLane();

    const failing = lane.run(() => {
      throw new Error('boom');
    });
    const next = lane.run(() => 'ok');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });

  it('idle() waits for everything queued so far', async () => {
    const lane = new SerialLane();
    let done = false;
    void lane.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      done = true;
    });

    await lane.idle();
    expect(done).toBe(true);
  });
});
