import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WorkDistributor } from '../../../src/core/work-distributor';
import { ResultChannel } from '../../../src/core/result-channel';
import { ConfigurationError } from '../../../src/core/errors';
import { ProtocolHandler, RequestResult } from '../../../src/protocols/base';

const okResult: RequestResult = { duration: 5, success: true, status: 200 };

const createMockHandler = (result: RequestResult = okResult) => {
  const execute = vi.fn(async () => result);
  const handler: ProtocolHandler = { execute };
  return { handler, execute };
};

async function drain(channel: ResultChannel<RequestResult>): Promise<RequestResult[]> {
  const received: RequestResult[] = [];
  for await (const result of channel) {
    received.push(result);
  }
  return received;
}

describe('WorkDistributor', () => {
  let distributor: WorkDistributor;

  beforeEach(() => {
    distributor = new WorkDistributor();
  });

  describe('computeAssignments()', () => {
    it('should give the first workers the remainder', () => {
      const assignments = distributor.computeAssignments(10, 3);

      expect(assignments).toEqual([
        { worker_index: 0, count: 4 },
        { worker_index: 1, count: 3 },
        { worker_index: 2, count: 3 }
      ]);
    });

    it('should split evenly when the total divides', () => {
      const counts = distributor.computeAssignments(12, 4).map(a => a.count);
      expect(counts).toEqual([3, 3, 3, 3]);
    });

    it('should sum to the total and differ by at most one', () => {
      for (let total = 1; total <= 40; total++) {
        for (let workers = 1; workers <= 12; workers++) {
          const counts = distributor.computeAssignments(total, workers).map(a => a.count);

          expect(counts).toHaveLength(workers);
          expect(counts.reduce((sum, c) => sum + c, 0)).toBe(total);
          expect(Math.max(...counts) - Math.min(...counts)).toBeLessThanOrEqual(1);
        }
      }
    });

    it('should assign zero units to surplus workers', () => {
      const counts = distributor.computeAssignments(2, 5).map(a => a.count);
      expect(counts).toEqual([1, 1, 0, 0, 0]);
    });

    it('should reject zero total units', () => {
      expect(() => distributor.computeAssignments(0, 3)).toThrow(ConfigurationError);
    });

    it('should reject zero workers', () => {
      expect(() => distributor.computeAssignments(5, 0)).toThrow(ConfigurationError);
    });

    it('should reject non-integer input', () => {
      expect(() => distributor.computeAssignments(2.5, 1)).toThrow(ConfigurationError);
      expect(() => distributor.computeAssignments(5, Number.NaN)).toThrow(ConfigurationError);
    });
  });

  describe('spawn()', () => {
    it('should execute every assigned unit and forward each result', async () => {
      const { handler, execute } = createMockHandler();
      const channel = new ResultChannel<RequestResult>(6);

      const workers = distributor.spawn(distributor.computeAssignments(10, 3), handler, channel);
      const received = await drain(channel);
      const outcomes = await Promise.all(workers);

      expect(execute).toHaveBeenCalledTimes(10);
      expect(received).toHaveLength(10);
      expect(outcomes.map(o => o.delivered)).toEqual([4, 3, 3]);
      expect(outcomes.every(o => o.error === undefined)).toBe(true);
    });

    it('should not spawn workers with nothing to do', async () => {
      const { handler } = createMockHandler();
      const channel = new ResultChannel<RequestResult>(10);

      const workers = distributor.spawn(distributor.computeAssignments(2, 5), handler, channel);
      await drain(channel);
      const outcomes = await Promise.all(workers);

      expect(workers).toHaveLength(2);
      expect(outcomes.map(o => o.worker_index)).toEqual([0, 1]);
    });

    it('should block producers on a full channel without losing results', async () => {
      const { handler } = createMockHandler();
      const channel = new ResultChannel<RequestResult>(1);

      const workers = distributor.spawn(distributor.computeAssignments(25, 4), handler, channel);
      const received = await drain(channel);
      await Promise.all(workers);

      expect(received).toHaveLength(25);
    });

    it('should resolve a crashed worker with its error and delivered count', async () => {
      let calls = 0;
      const handler: ProtocolHandler = {
        execute: async () => {
          calls++;
          if (calls === 3) {
            throw new Error('handler exploded');
          }
          return okResult;
        }
      };
      const channel = new ResultChannel<RequestResult>(4);

      const workers = distributor.spawn([{ worker_index: 0, count: 5 }], handler, channel);
      const received = await drain(channel);
      const [outcome] = await Promise.all(workers);

      expect(received).toHaveLength(2);
      expect(outcome).toEqual({
        worker_index: 0,
        assigned: 5,
        delivered: 2,
        error: 'handler exploded'
      });
    });

    it('should run units within one worker sequentially', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const handler: ProtocolHandler = {
        execute: async () => {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise(resolve => setTimeout(resolve, 2));
          inFlight--;
          return okResult;
        }
      };
      const channel = new ResultChannel<RequestResult>(2);

      const workers = distributor.spawn([{ worker_index: 0, count: 5 }], handler, channel);
      await drain(channel);
      await Promise.all(workers);

      expect(maxInFlight).toBe(1);
    });
  });
});
