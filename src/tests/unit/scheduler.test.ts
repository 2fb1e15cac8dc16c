import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import cron from 'node-cron';
import { DAY_ROLLOVER_CRON, scheduleDailyReading } from '../../scheduler/index.js';
import { DailyReadingJob } from '../../scheduler/DailyReadingJob.js';

vi.mock('node-cron', () => ({
  default: {
    schedule: vi.fn(() => ({ start: vi.fn(), stop: vi.fn() })),
  },
}));

const MINUTE_MS = 60 * 1000;

/** Drive the registered task the way node-cron does: once at the top of each minute. */
function tickEveryMinute(fromIso: string, toIso: string): void {
  const callback = vi.mocked(cron.schedule).mock.calls[0]?.[1];
  if (typeof callback !== 'function') {
    throw new Error('No task was scheduled');
  }
  for (let t = Date.parse(fromIso); t <= Date.parse(toIso); t += MINUTE_MS) {
    vi.setSystemTime(t);
    callback(new Date(t));
  }
}

describe('scheduleDailyReading', () => {
  let job: DailyReadingJob;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    job = new DailyReadingJob(
      { load: vi.fn().mockResolvedValue([]) },
      { connect: vi.fn(), sendToChannel: vi.fn() },
      { channelId: 1, timezone: 'Europe/London' }
    );
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('registers one per-minute task in the given timezone', () => {
    scheduleDailyReading(job, 'Europe/London');

    expect(DAY_ROLLOVER_CRON).toBe('0 * * * * *');
    expect(cron.schedule).toHaveBeenCalledTimes(1);
    expect(cron.schedule).toHaveBeenCalledWith('0 * * * * *', expect.any(Function), {
      timezone: 'Europe/London',
    });
  });

  it('does not run on the day it was started', () => {
    const run = vi.spyOn(job, 'run').mockResolvedValue(undefined);
    vi.setSystemTime(new Date('2025-01-05T10:00:00Z'));
    scheduleDailyReading(job, 'UTC');

    tickEveryMinute('2025-01-05T10:00:00Z', '2025-01-05T12:00:00Z');

    expect(run).not.toHaveBeenCalled();
  });

  it('runs once at local midnight on an ordinary day', () => {
    const run = vi.spyOn(job, 'run').mockResolvedValue(undefined);
    vi.setSystemTime(new Date('2025-01-05T23:00:00Z'));
    scheduleDailyReading(job, 'UTC');

    tickEveryMinute('2025-01-05T23:58:00Z', '2025-01-06T00:00:00Z');
    expect(run).toHaveBeenCalledTimes(1);

    tickEveryMinute('2025-01-06T00:01:00Z', '2025-01-06T02:00:00Z');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('runs once when local midnight is skipped by a DST change', () => {
    // Santiago moves from -04:00 to -03:00 on 2025-09-07: 23:59 is followed by 01:00
    const run = vi.spyOn(job, 'run').mockResolvedValue(undefined);
    vi.setSystemTime(new Date('2025-09-07T02:00:00Z'));
    scheduleDailyReading(job, 'America/Santiago');

    tickEveryMinute('2025-09-07T02:00:00Z', '2025-09-07T03:59:00Z');
    expect(run).not.toHaveBeenCalled();

    tickEveryMinute('2025-09-07T04:00:00Z', '2025-09-07T04:00:00Z');
    expect(run).toHaveBeenCalledTimes(1);

    tickEveryMinute('2025-09-07T04:01:00Z', '2025-09-07T06:00:00Z');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('runs once per day across several days', () => {
    const run = vi.spyOn(job, 'run').mockResolvedValue(undefined);
    vi.setSystemTime(new Date('2025-03-01T12:00:00Z'));
    scheduleDailyReading(job, 'Asia/Tokyo');

    tickEveryMinute('2025-03-01T12:00:00Z', '2025-03-04T12:00:00Z');

    expect(run).toHaveBeenCalledTimes(3);
  });
});
