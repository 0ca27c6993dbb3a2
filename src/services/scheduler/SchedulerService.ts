import cron, { ScheduledTask } from 'node-cron';
import { logger as defaultLogger, Logger } from '../../utils/logger';

export interface ScheduledJob {
  name: string;
  intervalSeconds: number;
  run: () => Promise<unknown>;
}

interface JobState {
  job: ScheduledJob;
  task: ScheduledTask;
  running: Promise<void> | null;
  skipped: number;
}

/** node-cron expression firing every `seconds` seconds */
export function everySeconds(seconds: number): string {
  if (!Number.isInteger(seconds) || seconds < 1 || seconds > 59) {
    throw new Error(`Interval must be a whole number of seconds between 1 and 59, got ${seconds}`);
  }
  return `*/${seconds} * * * * *`;
}

export class SchedulerService {
  private readonly jobs = new Map<string, JobState>();
  private isRunning: boolean = false;

  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * Register a job. A tick that arrives while the previous run of the same
   * job is still busy is skipped.
   */
  schedule(job: ScheduledJob): void {
    if (this.jobs.has(job.name)) {
      throw new Error(`Job "${job.name}" is already scheduled`);
    }

    const task = cron.schedule(everySeconds(job.intervalSeconds), () => this.tick(job.name), {
      scheduled: this.isRunning
    });
    this.jobs.set(job.name, { job, task, running: null, skipped: 0 });
    this.logger.info(`✅ Scheduled "${job.name}" every ${job.intervalSeconds}s`);
  }

  /**
   * Start all scheduled jobs
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('⚠️  Scheduler is already running');
      return;
    }
    for (const state of this.jobs.values()) {
      state.task.start();
    }
    this.isRunning = true;
    this.logger.info('✅ Scheduler started successfully');
  }

  /**
   * Stop all jobs and wait for runs that are still in progress
   */
  async stop(): Promise<void> {
    for (const state of this.jobs.values()) {
      state.task.stop();
    }
    this.isRunning = false;

    const inProgress: Promise<void>[] = [];
    for (const state of this.jobs.values()) {
      if (state.running) {
        inProgress.push(state.running);
      }
    }
    await Promise.all(inProgress);
    this.logger.info('🛑 Scheduler stopped');
  }

  /**
   * Manually trigger a job (for testing); shares the busy guard with ticks
   */
  async trigger(name: string): Promise<boolean> {
    const state = this.jobs.get(name);
    if (!state) {
      throw new Error(`Unknown job "${name}"`);
    }
    if (state.running) {
      state.skipped++;
      return false;
    }
    await this.execute(state);
    return true;
  }

  /**
   * Get scheduler status
   */
  getStatus(): { isRunning: boolean; jobs: Array<{ name: string; busy: boolean; skipped: number }> } {
    return {
      isRunning: this.isRunning,
      jobs: [...this.jobs.values()].map(state => ({
        name: state.job.name,
        busy: state.running !== null,
        skipped: state.skipped
      }))
    };
  }

  private tick(name: string): void {
    const state = this.jobs.get(name);
    if (!state) {
      return;
    }
    if (state.running) {
      state.skipped++;
      this.logger.debug(`⏭️  "${name}" still busy, tick skipped`);
      return;
    }
    void this.execute(state);
  }

  private execute(state: JobState): Promise<void> {
    const run = (async () => {
      try {
        await state.job.run();
      } catch (error) {
        // Continue running - don't let one failure stop the scheduler
        this.logger.error(`❌ Error in scheduled job "${state.job.name}":`, error);
      }
    })();
    state.running = run.finally(() => {
      state.running = null;
    });
    return state.running;
  }
}
