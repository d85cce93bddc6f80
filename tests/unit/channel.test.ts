/**
 * Unit Tests: OutcomeChannel buffering, blocking receive and close.
 */
import { describe, it, expect } from 'vitest';
import { OutcomeChannel } from '../../src/channel.js';

async function drain<T>(channel: OutcomeChannel<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of channel) {
    items.push(item);
  }
  return items;
}

describe('OutcomeChannel', () => {
  it('buffers items sent before anyone receives', async () => {
    const channel = new OutcomeChannel<number>();
    channel.send(1);
    channel.send(2);
    expect(channel.size).toBe(2);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('delivers items to a consumer that is already waiting', async () => {
    const channel = new OutcomeChannel<string>();
    const received = drain(channel);

    channel.send('a');
    await Promise.resolve();
    channel.send('b');
    channel.close();

    expect(await received).toEqual(['a', 'b']);
  });

  it('keeps a receiver pending until an item or close arrives', async () => {
    const channel = new OutcomeChannel<number>();
    let settled = false;
    const next = channel.receive().then(result => {
      settled = true;
      return result;
    });

    await Promise.resolve();
    expect(settled).toBe(false);

    channel.send(7);
    expect(await next).toEqual({ value: 7, done: false });
  });

  it('ends iteration for waiting receivers when closed', async () => {
    const channel = new OutcomeChannel<number>();
    const pending = channel.receive();
    channel.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(channel.closed).toBe(true);
  });

  it('still yields buffered items after close', async () => {
    const channel = new OutcomeChannel<number>();
    channel.send(1);
    channel.close();

    expect(await channel.receive()).toEqual({ value: 1, done: false });
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
  });

  it('rejects sends after close', () => {
    const channel = new OutcomeChannel<number>();
    channel.close();
    expect(() => channel.send(1)).toThrow('send on closed channel');
  });

  it('close is idempotent', () => {
    const channel = new OutcomeChannel<number>();
    channel.close();
    expect(() => channel.close()).not.toThrow();
  });
});
