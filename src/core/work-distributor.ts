import { ProtocolHandler, RequestResult } from '../protocols/base';
import { ResultChannel } from './result-channel';
import { ConfigurationError, errorMessage } from './errors';
import { logger } from '../utils/logger';

export interface WorkAssignment {
  worker_index: number;
  count: number;
}

export interface WorkerOutcome {
  worker_index: number;
  assigned: number;
  /** Results successfully handed to the channel */
  delivered: number;
  /** Set only when the worker task itself terminated abnormally */
  error?: string;
}

export class WorkDistributor {
  /**
   * Even split of `totalUnits` across `workers`: the first `total % workers`
   * workers take one extra unit.
   */
  computeAssignments(totalUnits: number, workers: number): WorkAssignment[] {
    if (!Number.isInteger(totalUnits) || totalUnits < 1) {
      throw new ConfigurationError(`Total requests must be a positive integer, got ${totalUnits}`);
    }
    if (!Number.isInteger(workers) || workers < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${workers}`);
    }

    const unitsPerWorker = Math.floor(totalUnits / workers);
    const remainder = totalUnits % workers;

    return Array.from({ length: workers }, (_, index) => ({
      worker_index: index,
      count: unitsPerWorker + (index < remainder ? 1 : 0)
    }));
  }

  /**
   * Starts one worker per non-empty assignment. Each returned promise settles
   * with the worker's outcome and never rejects.
   */
  spawn(
    assignments: WorkAssignment[],
    handler: ProtocolHandler,
    channel: ResultChannel<RequestResult>
  ): Promise<WorkerOutcome>[] {
    const workers: Promise<WorkerOutcome>[] = [];

    for (const assignment of assignments) {
      if (assignment.count === 0) {
        continue;
      }
      workers.push(this.runWorker(assignment, handler, channel));
    }

    logger.debug(`👷 Spawned ${workers.length} workers for ${assignments.reduce((sum, a) => sum + a.count, 0)} work units`);
    return workers;
  }

  private async runWorker(
    assignment: WorkAssignment,
    handler: ProtocolHandler,
    channel: ResultChannel<RequestResult>
  ): Promise<WorkerOutcome> {
    const sender = channel.sender();
    let delivered = 0;

    try {
      for (let i = 0; i < assignment.count; i++) {
        const result = await handler.execute();
        await sender.send(result);
        delivered++;
      }

      logger.debug(`🏁 Worker ${assignment.worker_index + 1} completed ${delivered} units`);
      return { worker_index: assignment.worker_index, assigned: assignment.count, delivered };
    } catch (error: unknown) {
      logger.error(`❌ Worker ${assignment.worker_index + 1} terminated after ${delivered}/${assignment.count} units:`, errorMessage(error));
      return {
        worker_index: assignment.worker_index,
        assigned: assignment.count,
        delivered,
        error: errorMessage(error)
      };
    } finally {
      sender.release();
    }
  }
}
