import { TaskQueue } from './task-queue';
import { decode } from './codec/payload-codec';
import {
  BrokerUnavailableError,
  InvalidJobIdError,
  StoreUnavailableError,
} from './errors';
import { FILE_STATS_TASK } from './task-names';
import { InMemoryBrokerChannel, InMemoryJobStore } from './testing';
import type { BrokerChannel } from './broker/broker-channel';
import type { JobStore } from './store/job-store';

describe('TaskQueue', () => {
  let broker: InMemoryBrokerChannel;
  let store: InMemoryJobStore;
  let ids: string[];
  let queue: TaskQueue;

  beforeEach(() => {
    broker = new InMemoryBrokerChannel();
    store = new InMemoryJobStore();
    ids = ['job-1', 'job-2'];
    queue = new TaskQueue(broker, store, {
      idFactory: () => {
        const id = ids.shift();
        if (!id) {
          throw new Error('out of ids');
        }
        return id;
      },
    });
  });

  describe('submit', () => {
    it('should enqueue the encoded content for the file stats task', async () => {
      const handle = await queue.submit('a\nb\nc');

      expect(handle.id).toBe('job-1');
      expect(broker.queued).toEqual([
        { jobId: 'job-1', taskName: FILE_STATS_TASK, payload: 'YQpiCmM' },
      ]);
      expect(decode(broker.queued[0].payload).toString('utf8')).toBe('a\nb\nc');
    });

    it('should record the job as PENDING without waiting for a worker', async () => {
      const handle = await queue.submit(Buffer.from([0x00, 0xff]));

      expect(store.has('job-1')).toBe(true);
      await expect(handle.status()).resolves.toEqual({
        id: 'job-1',
        state: 'PENDING',
        result: null,
      });
    });

    it('should give every submission its own id', async () => {
      const first = await queue.submit('x');
      const second = await queue.submit('x');

      expect(first.id).not.toBe(second.id);
      expect(broker.queued.map((job) => job.jobId)).toEqual(['job-1', 'job-2']);
    });

    it('should pass through an explicit task name', async () => {
      await queue.submit('x', 'other_task');

      expect(broker.queued[0].taskName).toBe('other_task');
    });

    it('should generate UUIDs by default', async () => {
      const defaultQueue = new TaskQueue(broker, store);

      const handle = await defaultQueue.submit('x');

      expect(handle.id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it('should fail hard and record nothing when the broker is down', async () => {
      const outage = new BrokerUnavailableError(
        'enqueue',
        new Error('connect ECONNREFUSED'),
      );
      const downBroker: BrokerChannel = {
        enqueue: jest.fn().mockRejectedValue(outage),
        consume: jest.fn(),
      };
      const failingQueue = new TaskQueue(downBroker, store, {
        idFactory: () => 'job-9',
      });

      await expect(failingQueue.submit('x')).rejects.toBe(outage);
      expect(store.has('job-9')).toBe(false);
    });

    it('should still return the handle when the PENDING write fails', async () => {
      const flakyStore: JobStore = {
        markPending: jest
          .fn()
          .mockRejectedValue(
            new StoreUnavailableError('write', new Error('connection reset')),
          ),
        settle: (jobId, outcome) => store.settle(jobId, outcome),
        get: (jobId) => store.get(jobId),
      };
      const flakyQueue = new TaskQueue(broker, flakyStore, {
        idFactory: () => 'job-3',
      });

      const handle = await flakyQueue.submit('x');

      expect(handle.id).toBe('job-3');
      expect(broker.queued.map((job) => job.jobId)).toEqual(['job-3']);
      await expect(handle.status()).resolves.toEqual({
        id: 'job-3',
        state: 'PENDING',
        result: null,
      });
    });
  });

  describe('handle', () => {
    it('should rebuild a handle from a bare id', async () => {
      await store.markPending('job-7');

      const handle = queue.handle('job-7');

      expect(handle.id).toBe('job-7');
      await expect(handle.isSuccessful()).resolves.toBe(false);
    });

    it('should reject an invalid id', () => {
      expect(() => queue.handle('a/b')).toThrow(InvalidJobIdError);
    });
  });
});
