import { describe, expect, it } from 'vitest';
import { BoundedChannel } from './BoundedChannel';

describe('BoundedChannel', () => {
  it('delivers items in push order', async () => {
    const channel = new BoundedChannel<number>(3);
    await channel.push(1);
    await channel.push(2);
    await channel.push(3);
    expect(channel.isFull()).toBe(true);
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
    expect(await channel.receive()).toBe(3);
    expect(channel.size).toBe(0);
  });

  it('hands an item straight to a waiting receiver', async () => {
    const channel = new BoundedChannel<string>(1);
    const pending = channel.receive();
    await channel.push('a');
    expect(await pending).toBe('a');
    expect(channel.size).toBe(0);
  });

  it('blocks a push while full and admits it once space frees up', async () => {
    const channel = new BoundedChannel<number>(2);
    await channel.push(1);
    await channel.push(2);
    let accepted: boolean | null = null;
    const blocked = channel.push(3).then((result) => {
      accepted = result;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(accepted).toBeNull();
    expect(channel.size).toBe(2);

    expect(await channel.receive()).toBe(1);
    await blocked;
    expect(accepted).toBe(true);
    expect(channel.size).toBe(2);
    expect(await channel.receive()).toBe(2);
    expect(await channel.receive()).toBe(3);
  });

  it('resolves undefined when nothing arrives within the timeout', async () => {
    const channel = new BoundedChannel<number>(1);
    expect(await channel.receive(20)).toBeUndefined();
    await channel.push(7);
    expect(await channel.receive(20)).toBe(7);
  });

  it('drops queued and pending items on close and refuses new ones', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.push(1);
    const blocked = channel.push(2);
    channel.close();
    expect(await blocked).toBe(false);
    expect(await channel.push(3)).toBe(false);
    expect(channel.getDroppedCount()).toBe(3);
    expect(await channel.receive(1000)).toBeUndefined();
  });

  it('leaves items out of the dropped count when told to', async () => {
    const channel = new BoundedChannel<number>(2, (item) => item >= 0);
    await channel.push(1);
    await channel.push(-1);
    const blocked = channel.push(-2);
    channel.close();
    expect(await blocked).toBe(false);
    expect(await channel.push(3)).toBe(false);
    expect(await channel.push(-3)).toBe(false);
    expect(channel.getDroppedCount()).toBe(2);
  });

  it('releases waiting receivers on close', async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.receive(60_000);
    channel.close();
    expect(await pending).toBeUndefined();
  });

  it('rejects a capacity below one', () => {
    expect(() => new BoundedChannel<number>(0)).toThrow('Channel capacity must be a positive integer, got 0');
  });
});
