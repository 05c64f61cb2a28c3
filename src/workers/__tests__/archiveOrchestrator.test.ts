import { describe, it, expect, vi } from 'vitest';
import { ArchiveOrchestrator } from '../archiveOrchestrator.js';
import type { JobRunner } from '../jobRunner.js';
import { buildChannel, buildJob } from '../../test/factories.js';
import type { ArchiveJobData, WorkerResult } from '../../types/archive.js';

vi.mock('../../utils/logger.js', () => ({
  default: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

function jobsFor(ids: string[]): ArchiveJobData[] {
  return ids.map((id) =>
    buildJob({ channel: buildChannel({ id, name: `channel-${id}` }) })
  );
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ArchiveOrchestrator', () => {
  it('should produce one result per channel and isolate a failing worker', async () => {
    const runner: JobRunner = async (job) => {
      if (job.channel.id === '3') {
        throw new Error('process crashed');
      }
      return { channelId: job.channel.id, status: 'Success', message: 'Done' };
    };
    const onResult = vi.fn();

    const results = await new ArchiveOrchestrator(runner, 2).run(
      jobsFor(['1', '2', '3', '4', '5']),
      { onResult }
    );

    expect(results).toHaveLength(5);
    expect(results.find((result) => result.channelId === '3')).toEqual({
      channelId: '3',
      status: 'Error',
      message: 'Worker error: process crashed',
    });
    expect(
      results.filter((result) => result.status === 'Success').map((r) => r.channelId).sort()
    ).toEqual(['1', '2', '4', '5']);
    expect(onResult).toHaveBeenCalledTimes(5);
  });

  it('should never run more jobs at once than the pool allows', async () => {
    let active = 0;
    let peak = 0;
    const runner: JobRunner = async (job) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return { channelId: job.channel.id, status: 'Empty', message: 'No messages found' };
    };

    await new ArchiveOrchestrator(runner, 3).run(
      jobsFor(['1', '2', '3', '4', '5', '6', '7'])
    );

    expect(peak).toBe(3);
  });

  it('should report results in completion order', async () => {
    const gates = new Map([
      ['1', deferred()],
      ['2', deferred()],
    ]);
    const runner: JobRunner = async (job) => {
      await gates.get(job.channel.id)?.promise;
      return { channelId: job.channel.id, status: 'Success', message: 'Done' };
    };
    const order: string[] = [];

    const pending = new ArchiveOrchestrator(runner, 2).run(jobsFor(['1', '2']), {
      onResult: (result: WorkerResult) => order.push(result.channelId),
    });
    gates.get('2')?.resolve();
    await new Promise((resolve) => setTimeout(resolve, 0));
    gates.get('1')?.resolve();
    await pending;

    expect(order).toEqual(['2', '1']);
  });

  it('should forward state changes from workers', async () => {
    const runner: JobRunner = async (job, onStateChange) => {
      onStateChange?.(job.channel.id, 'Fetching');
      return { channelId: job.channel.id, status: 'Empty', message: 'No messages found' };
    };
    const onStateChange = vi.fn();

    await new ArchiveOrchestrator(runner).run(jobsFor(['9']), { onStateChange });

    expect(onStateChange).toHaveBeenCalledWith('9', 'Fetching');
  });

  it('should return an empty list for no jobs', async () => {
    const runner = vi.fn();

    expect(await new ArchiveOrchestrator(runner).run([])).toEqual([]);
    expect(runner).not.toHaveBeenCalled();
  });

  it('should keep going when the result hook throws', async () => {
    const runner: JobRunner = async (job) => ({
      channelId: job.channel.id,
      status: 'Success',
      message: 'Done',
    });

    const results = await new ArchiveOrchestrator(runner, 1).run(jobsFor(['1', '2']), {
      onResult: () => {
        throw new Error('listener failed');
      },
    });

    expect(results).toHaveLength(2);
  });
});
