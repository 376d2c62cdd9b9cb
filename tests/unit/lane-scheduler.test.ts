import { LaneScheduler } from '../../src/queue/lane-scheduler';
import { LaneFullError } from '../../src/resilience/errors';
import { flushPromises } from '../support/fakes';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('LaneScheduler', () => {
  let started: string[];
  let gates: Map<string, Deferred<string>>;

  /** Task that records its start and finishes when its gate opens */
  function gated(name: string): () => Promise<string> {
    const gate = deferred<string>();
    gates.set(name, gate);
    return () => {
      started.push(name);
      return gate.promise;
    };
  }

  function open(name: string): void {
    gates.get(name)?.resolve(name);
  }

  beforeEach(() => {
    started = [];
    gates = new Map();
  });

  it('should reject a non-positive pool or lane capacity', () => {
    expect(() => new LaneScheduler(0, 1)).toThrow('poolSize must be at least 1, got 0');
    expect(() => new LaneScheduler(1, 0)).toThrow('laneCapacity must be at least 1, got 0');
  });

  it('should run one job per lane at a time, in scheduling order', async () => {
    const scheduler = new LaneScheduler(4, 10);
    const results = [
      scheduler.schedule('ticket:1', gated('a1')),
      scheduler.schedule('ticket:1', gated('a2')),
      scheduler.schedule('ticket:1', gated('a3')),
    ];

    expect(started).toEqual(['a1']);
    open('a2'); // finishing early does not jump the queue
    await flushPromises();
    expect(started).toEqual(['a1']);

    open('a1');
    await flushPromises();
    expect(started).toEqual(['a1', 'a2', 'a3']);

    open('a3');
    await expect(Promise.all(results)).resolves.toEqual(['a1', 'a2', 'a3']);
  });

  it('should run distinct lanes in parallel up to the pool size', async () => {
    const scheduler = new LaneScheduler(2, 10);
    scheduler.schedule('a', gated('a'));
    scheduler.schedule('b', gated('b'));
    const c = scheduler.schedule('c', gated('c'));

    expect(started).toEqual(['a', 'b']);
    expect(scheduler.stats()).toEqual({ active: 2, queued: 1, lanes: 3 });

    open('b');
    await flushPromises();
    expect(started).toEqual(['a', 'b', 'c']);

    open('c');
    await expect(c).resolves.toBe('c');
  });

  it('should serve ready lanes round-robin', async () => {
    const scheduler = new LaneScheduler(1, 10);
    scheduler.schedule('a', gated('a1'));
    scheduler.schedule('a', gated('a2'));
    scheduler.schedule('b', gated('b1'));

    open('a1');
    await flushPromises();
    expect(started).toEqual(['a1', 'b1']);

    open('b1');
    await flushPromises();
    expect(started).toEqual(['a1', 'b1', 'a2']);
  });

  it('should refuse work beyond the lane capacity without affecting other lanes', async () => {
    const scheduler = new LaneScheduler(4, 2);
    scheduler.schedule('ticket:1', gated('one'));
    scheduler.schedule('ticket:1', gated('two'));

    expect(() => scheduler.schedule('ticket:1', gated('three'))).toThrow(LaneFullError);
    expect(scheduler.depth('ticket:1')).toBe(2);
    expect(() => scheduler.schedule('ticket:2', gated('other'))).not.toThrow();

    open('one');
    await flushPromises();
    expect(scheduler.depth('ticket:1')).toBe(1);
    expect(() => scheduler.schedule('ticket:1', gated('four'))).not.toThrow();
  });

  it('should pass a task failure to its caller and keep draining the lane', async () => {
    const scheduler = new LaneScheduler(1, 10);
    const failing = scheduler.schedule('a', async () => {
      throw new Error('task broke');
    });
    const next = scheduler.schedule('a', async () => 'next');

    await expect(failing).rejects.toThrow('task broke');
    await expect(next).resolves.toBe('next');
  });

  it('should contain a task that throws synchronously', async () => {
    const scheduler = new LaneScheduler(1, 10);
    const result = scheduler.schedule<string>('a', () => {
      throw new Error('sync throw');
    });

    await expect(result).rejects.toThrow('sync throw');
    await scheduler.onIdle();
    expect(scheduler.stats()).toEqual({ active: 0, queued: 0, lanes: 0 });
  });

  it('should resolve onIdle immediately when empty and after the last job otherwise', async () => {
    const scheduler = new LaneScheduler(2, 10);
    await expect(scheduler.onIdle()).resolves.toBeUndefined();

    scheduler.schedule('a', gated('a'));
    scheduler.schedule('a', gated('a2'));
    let idle = false;
    const waiting = scheduler.onIdle().then(() => {
      idle = true;
    });

    open('a');
    await flushPromises();
    expect(idle).toBe(false);

    open('a2');
    await waiting;
    expect(idle).toBe(true);
    expect(scheduler.stats().lanes).toBe(0);
  });
});
