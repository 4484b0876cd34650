import {
  StoreUnavailableError,
  TaskQueue,
  encode,
  failure,
  success,
} from '@pkg/jobs';
import type { JobSpec } from '@pkg/jobs';
import { InMemoryBrokerChannel, InMemoryJobStore } from '@pkg/jobs/testing';
import { JobExecutor } from './job-executor';
import { TaskRegistry, createTaskRegistry } from '../tasks';
import type { DelayStrategy } from '../delay/delay-strategy';

describe('JobExecutor', () => {
  let store: InMemoryJobStore;
  let delay: { nextDelayMs: jest.Mock };
  let executor: JobExecutor;

  function job(jobId: string, payload: string, taskName = 'file_stats'): JobSpec {
    return { jobId, taskName, payload };
  }

  beforeEach(() => {
    store = new InMemoryJobStore();
    delay = { nextDelayMs: jest.fn().mockReturnValue(0) };
    executor = new JobExecutor(store, createTaskRegistry(), delay);
  });

  it('should settle line and character counts', async () => {
    const settled = await executor.execute(
      job('job-1', encode(Buffer.from('a\nb\nc'))),
    );

    expect(settled).toEqual({
      applied: true,
      record: {
        id: 'job-1',
        state: 'SUCCESS',
        result: { lines: 2, characters: 5 },
      },
    });
    await expect(store.get('job-1')).resolves.toEqual(settled.record);
  });

  it('should settle zeros for empty content', async () => {
    const settled = await executor.execute(job('job-1', ''));

    expect(settled.record).toEqual({
      id: 'job-1',
      state: 'SUCCESS',
      result: { lines: 0, characters: 0 },
    });
  });

  it('should settle a malformed payload as FAILURE after the same delay', async () => {
    const settled = await executor.execute(job('job-1', 'not base64!'));

    expect(settled.record).toEqual({
      id: 'job-1',
      state: 'FAILURE',
      result: 'failed to decode: payload contains characters outside base64url',
    });
    expect(delay.nextDelayMs).toHaveBeenCalledTimes(1);
  });

  it('should settle content that is not UTF-8 as FAILURE', async () => {
    const settled = await executor.execute(
      job('job-1', encode(Buffer.from([0xff, 0xfe, 0x00]))),
    );

    expect(settled.record).toEqual({
      id: 'job-1',
      state: 'FAILURE',
      result: 'failed to decode: content is not valid UTF-8',
    });
  });

  it('should settle an unknown task as FAILURE', async () => {
    const settled = await executor.execute(job('job-1', '', 'resize_image'));

    expect(settled.record).toEqual({
      id: 'job-1',
      state: 'FAILURE',
      result: 'unknown task: resize_image',
    });
  });

  it('should settle an error thrown by a task as FAILURE', async () => {
    const registry = new TaskRegistry().register('explode', () => {
      throw new Error('disk full');
    });
    executor = new JobExecutor(store, registry, delay);

    const settled = await executor.execute(job('job-1', '', 'explode'));

    expect(settled.record).toEqual({
      id: 'job-1',
      state: 'FAILURE',
      result: 'disk full',
    });
  });

  it('should not run a job again once it is settled', async () => {
    const spec = job('job-1', encode(Buffer.from('x\n')));

    const first = await executor.execute(spec);
    const second = await executor.execute(spec);

    expect(second).toEqual({ applied: false, record: first.record });
    expect(store.settleCalls).toBe(1);
    expect(delay.nextDelayMs).toHaveBeenCalledTimes(1);
  });

  it('should keep the first settlement when two deliveries race', async () => {
    const spec = job('job-1', encode(Buffer.from('x\n')));

    const [a, b] = await Promise.all([
      executor.execute(spec),
      executor.execute(spec),
    ]);

    expect([a.applied, b.applied].sort()).toEqual([false, true]);
    expect(a.record).toEqual(b.record);
    await expect(store.get('job-1')).resolves.toEqual({
      id: 'job-1',
      state: 'SUCCESS',
      result: { lines: 1, characters: 2 },
    });
  });

  it('should let store failures escape so the delivery is retried', async () => {
    const outage = new StoreUnavailableError('write', new Error('timeout'));
    jest.spyOn(store, 'settle').mockRejectedValueOnce(outage);

    await expect(executor.execute(job('job-1', ''))).rejects.toBe(outage);
    await expect(store.get('job-1')).resolves.toEqual({
      id: 'job-1',
      state: 'PENDING',
      result: null,
    });
  });

  it('should only ever move a job out of PENDING through settle', async () => {
    await store.settle('job-1', failure('first'));

    await store.settle('job-1', success({ lines: 9, characters: 9 }));

    await expect(store.get('job-1')).resolves.toEqual({
      id: 'job-1',
      state: 'FAILURE',
      result: 'first',
    });
  });

  describe('end to end', () => {
    let broker: InMemoryBrokerChannel;
    let queue: TaskQueue;

    async function drain(): Promise<void> {
      while (await broker.consume(async (spec) => {
        await executor.execute(spec);
      })) {
        // keep consuming
      }
    }

    beforeEach(() => {
      broker = new InMemoryBrokerChannel();
      queue = new TaskQueue(broker, store);
    });

    it('should go from PENDING to SUCCESS', async () => {
      const handle = await queue.submit('a\nb\nc');
      await expect(handle.isSuccessful()).resolves.toBe(false);

      await drain();

      await expect(handle.status()).resolves.toEqual({
        id: handle.id,
        state: 'SUCCESS',
        result: { lines: 2, characters: 5 },
      });
      await expect(queue.handle(handle.id).result()).resolves.toEqual({
        lines: 2,
        characters: 5,
      });
    });

    it('should keep processing after a corrupted payload', async () => {
      await broker.enqueue(job('job-bad', '%%%'));
      const good = await queue.submit(new Uint8Array(0));

      await drain();

      const bad = await store.get('job-bad');
      expect(bad.state).toBe('FAILURE');
      expect(bad.result).toEqual(expect.any(String));
      expect(String(bad.result).length).toBeGreaterThan(0);
      await expect(good.result()).resolves.toEqual({
        lines: 0,
        characters: 0,
      });
      expect(broker.acknowledged).toBe(2);
    });

    it('should settle exactly once when a delivery is retried', async () => {
      const handle = await queue.submit('x');
      const outage = new StoreUnavailableError('write', new Error('timeout'));
      const settle = jest.spyOn(store, 'settle').mockRejectedValueOnce(outage);

      await expect(
        broker.consume(async (spec) => {
          await executor.execute(spec);
        }),
      ).rejects.toBe(outage);
      expect(broker.redelivered).toBe(1);
      await expect(handle.status()).resolves.toMatchObject({ state: 'PENDING' });

      await drain();

      expect(settle).toHaveBeenCalledTimes(2);
      await expect(handle.result()).resolves.toEqual({
        lines: 0,
        characters: 1,
      });
    });

    it('should never go back to PENDING once settled', async () => {
      const handle = await queue.submit('abc');
      await drain();

      const states: string[] = [];
      for (let i = 0; i < 3; i++) {
        states.push((await handle.status()).state);
      }
      await store.markPending(handle.id);
      states.push((await handle.status()).state);

      expect(states).toEqual(['SUCCESS', 'SUCCESS', 'SUCCESS', 'SUCCESS']);
    });
  });
});

describe('JobExecutor delay strategy', () => {
  it('should wait the drawn delay before settling', async () => {
    jest.useFakeTimers();
    try {
      const store = new InMemoryJobStore();
      const delay: DelayStrategy = { nextDelayMs: () => 5000 };
      const executor = new JobExecutor(store, createTaskRegistry(), delay);

      const pending = executor.execute({
        jobId: 'job-1',
        taskName: 'file_stats',
        payload: '',
      });

      await jest.advanceTimersByTimeAsync(4999);
      await expect(store.get('job-1')).resolves.toMatchObject({
        state: 'PENDING',
      });

      await jest.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toMatchObject({ applied: true });
    } finally {
      jest.useRealTimers();
    }
  });
});
