import { afterEach, describe, expect, it } from 'vitest';
import { everySeconds, SchedulerService } from '../src/services/scheduler/SchedulerService';
import { silentLogger } from './helpers/fakes';

describe('everySeconds', () => {
  it('builds a seconds-field cron expression', () => {
    expect(everySeconds(5)).toBe('*/5 * * * * *');
  });

  it('rejects intervals cron cannot express', () => {
    expect(() => everySeconds(0)).toThrow('between 1 and 59');
    expect(() => everySeconds(60)).toThrow('between 1 and 59');
    expect(() => everySeconds(1.5)).toThrow('between 1 and 59');
  });
});

describe('SchedulerService', () => {
  const scheduler = new SchedulerService(silentLogger);

  afterEach(async () => {
    await scheduler.stop();
  });

  it('skips a trigger while the previous run is busy', async () => {
    let finish: () => void = () => undefined;
    let runs = 0;
    scheduler.schedule({
      name: 'slow',
      intervalSeconds: 30,
      run: () => {
        runs++;
        return new Promise<void>(resolve => {
          finish = resolve;
        });
      }
    });

    const first = scheduler.trigger('slow');
    expect(await scheduler.trigger('slow')).toBe(false);
    expect(scheduler.getStatus().jobs).toEqual([{ name: 'slow', busy: true, skipped: 1 }]);

    finish();
    expect(await first).toBe(true);
    expect(runs).toBe(1);
    expect(scheduler.getStatus().jobs[0].busy).toBe(false);
  });

  it('keeps going after a job throws', async () => {
    scheduler.schedule({
      name: 'broken',
      intervalSeconds: 10,
      run: async () => {
        throw new Error('boom');
      }
    });

    await expect(scheduler.trigger('broken')).resolves.toBe(true);
    await expect(scheduler.trigger('broken')).resolves.toBe(true);
  });

  it('refuses duplicate job names', () => {
    scheduler.schedule({ name: 'twice', intervalSeconds: 5, run: async () => undefined });
    expect(() => scheduler.schedule({ name: 'twice', intervalSeconds: 5, run: async () => undefined })).toThrow(
      'Job "twice" is already scheduled'
    );
  });
});
