import { describe, expect, it } from 'vitest';
import { ChannelClosedError } from '../shared/errors.js';
import { BoundedChannel } from './channel.js';

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('BoundedChannel', () => {
  it('delivers items in send order', async () => {
    const channel = new BoundedChannel<number>(10);
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);

    expect(await channel.recv()).toBe(1);
    expect(await channel.recv()).toBe(2);
    expect(await channel.recv()).toBe(3);
  });

  it('holds the sender while the buffer is full', async () => {
    const channel = new BoundedChannel<string>(2);
    await channel.send('a');
    await channel.send('b');

    let sent = false;
    const blocked = channel.send('c').then(() => {
      sent = true;
    });
    await tick();
    expect(sent).toBe(false);
    expect(channel.length).toBe(2);

    expect(await channel.recv()).toBe('a');
    await blocked;
    expect(sent).toBe(true);
    expect(await channel.recv()).toBe('b');
    expect(await channel.recv()).toBe('c');
  });

  it('hands an item straight to a waiting receiver', async () => {
    const channel = new BoundedChannel<string>(1);
    const received = channel.recv();
    await channel.send('x');
    expect(await received).toBe('x');
    expect(channel.length).toBe(0);
  });

  it('drains buffered and blocked items after close, then ends', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);
    channel.close();

    expect(await channel.recv()).toBe(1);
    await blocked;
    expect(await channel.recv()).toBe(2);
    expect(await channel.recv()).toBeUndefined();
    expect(await channel.recv()).toBeUndefined();
  });

  it('wakes waiting receivers with undefined on close', async () => {
    const channel = new BoundedChannel<number>(4);
    const waiting = [channel.recv(), channel.recv()];
    channel.close();
    await expect(Promise.all(waiting)).resolves.toEqual([undefined, undefined]);
  });

  it('rejects sends after close', async () => {
    const channel = new BoundedChannel<number>(4);
    channel.close();
    expect(channel.isClosed).toBe(true);
    await expect(channel.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('iterates until closed', async () => {
    const channel = new BoundedChannel<number>(2);
    const producer = (async () => {
      for (let i = 0; i < 5; i++) await channel.send(i);
      channel.close();
    })();

    const seen: number[] = [];
    for await (const item of channel) seen.push(item);
    await producer;

    expect(seen).toEqual([0, 1, 2, 3, 4]);
  });

  it('rejects a capacity below one', () => {
    expect(() => new BoundedChannel<number>(0)).toThrow(RangeError);
  });
});
