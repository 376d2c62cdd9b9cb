import { LaneFullError } from '../resilience/errors';
import { activeWorkers, queuedEvents } from '../observability/metrics';

interface Job {
  run: () => Promise<void>;
}

interface Lane {
  jobs: Job[];
  running: boolean;
}

export interface LaneStats {
  active: number;
  queued: number;
  lanes: number;
}

/**
 * Per-key FIFO lanes drained by a bounded pool.
 *
 * A lane runs one job at a time, in scheduling order. Distinct lanes run in
 * parallel up to `poolSize`. Ready lanes are served round-robin so a busy lane
 * cannot starve the others.
 */
export class LaneScheduler {
  private readonly lanes = new Map<string, Lane>();
  /** Lanes with queued jobs and nothing running, oldest first */
  private readonly ready: string[] = [];
  private active = 0;
  private queued = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly poolSize: number,
    private readonly laneCapacity: number,
  ) {
    if (poolSize < 1) throw new Error(`poolSize must be at least 1, got ${poolSize}`);
    if (laneCapacity < 1) throw new Error(`laneCapacity must be at least 1, got ${laneCapacity}`);
  }

  /**
   * Queue `task` on `laneKey`. Throws LaneFullError synchronously when the lane
   * already holds `laneCapacity` jobs (queued + running).
   */
  schedule<T>(laneKey: string, task: () => Promise<T>): Promise<T> {
    const lane = this.lanes.get(laneKey) ?? { jobs: [], running: false };
    if (this.depth(laneKey) >= this.laneCapacity) {
      throw new LaneFullError(laneKey, this.laneCapacity);
    }

    return new Promise<T>((resolve, reject) => {
      lane.jobs.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (err) {
            reject(err);
          }
        },
      });
      this.lanes.set(laneKey, lane);
      this.queued++;
      if (!lane.running && lane.jobs.length === 1) this.ready.push(laneKey);
      this.pump();
    });
  }

  /** Jobs held by a lane, running one included */
  depth(laneKey: string): number {
    const lane = this.lanes.get(laneKey);
    if (!lane) return 0;
    return lane.jobs.length + (lane.running ? 1 : 0);
  }

  stats(): LaneStats {
    return { active: this.active, queued: this.queued, lanes: this.lanes.size };
  }

  /** Resolves once nothing is queued or running */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queued === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.poolSize && this.ready.length > 0) {
      const laneKey = this.ready.shift();
      if (laneKey === undefined) break;
      const lane = this.lanes.get(laneKey);
      const job = lane?.jobs.shift();
      if (!lane || !job) continue;

      lane.running = true;
      this.active++;
      this.queued--;
      this.publish();
      void this.execute(laneKey, lane, job);
    }
    this.publish();
  }

  private async execute(laneKey: string, lane: Lane, job: Job): Promise<void> {
    // run() settles the caller's promise and never rejects
    try {
      await job.run();
    } finally {
      lane.running = false;
      this.active--;
      if (lane.jobs.length > 0) {
        this.ready.push(laneKey);
      } else {
        this.lanes.delete(laneKey);
      }
      this.pump();
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (this.active !== 0 || this.queued !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private publish(): void {
    activeWorkers.set(this.active);
    queuedEvents.set(this.queued);
  }
}
