import { Broadcaster } from '../../../src/orchestrator/broadcaster';

interface Tick {
  n: number;
}

async function drain(iterable: AsyncIterable<Tick>): Promise<number[]> {
  const seen: number[] = [];
  for await (const item of iterable) seen.push(item.n);
  return seen;
}

describe('Broadcaster', () => {
  it('delivers items to each subscriber in publish order', async () => {
    const broadcaster = new Broadcaster<Tick>(16);
    const a = broadcaster.subscribe();
    const b = broadcaster.subscribe();

    [1, 2, 3].forEach((n) => broadcaster.publish({ n }));
    broadcaster.closeAll();

    expect(await drain(a)).toEqual([1, 2, 3]);
    expect(await drain(b)).toEqual([1, 2, 3]);
  });

  it('does not replay history to late subscribers', async () => {
    const broadcaster = new Broadcaster<Tick>(16);
    broadcaster.subscribe();
    broadcaster.publish({ n: 1 });

    const late = broadcaster.subscribe();
    broadcaster.publish({ n: 2 });
    broadcaster.closeAll();

    expect(await drain(late)).toEqual([2]);
  });

  it('drops the oldest buffered item when a slow subscriber falls behind', async () => {
    const broadcaster = new Broadcaster<Tick>(3);
    const slow = broadcaster.subscribe();

    [1, 2, 3, 4, 5].forEach((n) => broadcaster.publish({ n }));
    broadcaster.closeAll();

    expect(slow.dropped).toBe(2);
    expect(await drain(slow)).toEqual([3, 4, 5]);
  });

  it('hands an item straight to a waiting reader', async () => {
    const broadcaster = new Broadcaster<Tick>(1);
    const queue = broadcaster.subscribe();

    const pending = queue.next();
    broadcaster.publish({ n: 7 });

    expect(await pending).toEqual({ done: false, value: { n: 7 } });
    expect(queue.dropped).toBe(0);
  });

  it('serves concurrent reads in call order', async () => {
    const broadcaster = new Broadcaster<Tick>(4);
    const queue = broadcaster.subscribe();

    const first = queue.next();
    const second = queue.next();
    const third = queue.next();
    broadcaster.publish({ n: 1 });
    broadcaster.publish({ n: 2 });
    queue.close();

    expect(await first).toEqual({ done: false, value: { n: 1 } });
    expect(await second).toEqual({ done: false, value: { n: 2 } });
    expect(await third).toEqual({ done: true, value: undefined });
  });

  it('forgets a subscriber once it closes, and closing ends a pending read', async () => {
    const broadcaster = new Broadcaster<Tick>(4);
    const queue = broadcaster.subscribe();
    expect(broadcaster.size).toBe(1);

    const pending = queue.next();
    queue.close();

    expect(await pending).toEqual({ done: true, value: undefined });
    expect(broadcaster.size).toBe(0);
    broadcaster.publish({ n: 1 });
    expect(await queue.next()).toEqual({ done: true, value: undefined });
  });

  it('unsubscribes when the consumer breaks out of iteration', async () => {
    const broadcaster = new Broadcaster<Tick>(4);
    const queue = broadcaster.subscribe();
    broadcaster.publish({ n: 1 });
    broadcaster.publish({ n: 2 });

    for await (const item of queue) {
      if (item.n === 1) break;
    }

    expect(queue.isClosed).toBe(true);
    expect(broadcaster.size).toBe(0);
  });

  it('rejects a non-positive buffer size', () => {
    expect(() => new Broadcaster<Tick>(0)).toThrow('subscriber buffer size must be a positive integer, got 0');
  });
});
