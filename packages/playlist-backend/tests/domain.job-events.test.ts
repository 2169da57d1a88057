import { describe, expect, it } from 'vitest';

import { JobEventHub, isTerminalEvent, type JobEvent } from '../src/domain/job-events.js';
import type { JobRecord } from '../src/domain/job-model.js';
import { makeResult, silentLogger } from './helpers/fixtures.js';

const baseJob: JobRecord = {
  id: 'job-test',
  status: 'processing',
  request: { description: 'sunset beach bonfire', durationMinutes: 45, accessToken: null },
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
  startedAt: new Date('2024-01-01T00:00:01Z'),
  completedAt: null,
  progress: 'Working',
  result: null,
  error: null,
};

const progress = (label: string, id = baseJob.id): JobEvent => ({
  type: 'job_progress',
  job: { ...baseJob, id, progress: label },
});

const completed = (id = baseJob.id): JobEvent => ({
  type: 'job_completed',
  job: {
    ...baseJob,
    id,
    status: 'completed',
    completedAt: new Date('2024-01-01T00:00:09Z'),
    result: makeResult(),
  },
});

async function collect(iterable: AsyncIterable<JobEvent>): Promise<JobEvent[]> {
  const out: JobEvent[] = [];
  for await (const event of iterable) out.push(event);
  return out;
}

describe('domain/job-events', () => {
  /**
   * Intent:
   * - Publishing never waits on a reader; each observer buffers independently.
   * - A slow observer loses the oldest progress events, never the terminal one.
   * - After the terminal event the observer detaches and its iteration ends.
   */

  it('delivers published events in order and ends after the terminal event', async () => {
    const hub = new JobEventHub({ bufferSize: 8, logger: silentLogger });
    const subscription = hub.subscribe(baseJob.id);

    hub.publish(progress('one'));
    hub.publish(progress('two'));
    hub.publish(completed());
    hub.publish(progress('after terminal'));

    const events = await collect(subscription);
    expect(events.map((event) => event.type)).toEqual(['job_progress', 'job_progress', 'job_completed']);
    expect(events.map((event) => event.job.progress)).toEqual(['one', 'two', 'Working']);
    expect(hub.observerCount(baseJob.id)).toBe(0);
  });

  it('hands an event straight to a waiting reader', async () => {
    const hub = new JobEventHub({ bufferSize: 1, logger: silentLogger });
    const subscription = hub.subscribe(baseJob.id);

    const pending = subscription.next();
    hub.publish(progress('live'));

    await expect(pending).resolves.toEqual({ value: progress('live'), done: false });
    subscription.close();
  });

  it('only routes events for the subscribed job', async () => {
    const hub = new JobEventHub({ bufferSize: 4, logger: silentLogger });
    const subscription = hub.subscribe('job-a');

    hub.publish(progress('other', 'job-b'));
    hub.publish(completed('job-a'));

    const events = await collect(subscription);
    expect(events).toHaveLength(1);
    expect(events[0]?.job.id).toBe('job-a');
  });

  it('drops the oldest progress events when the buffer is full but keeps the terminal event', async () => {
    const hub = new JobEventHub({ bufferSize: 2, logger: silentLogger });
    const subscription = hub.subscribe(baseJob.id);

    hub.publish(progress('p1'));
    hub.publish(progress('p2'));
    hub.publish(progress('p3'));
    hub.publish(completed());

    const events = await collect(subscription);
    expect(events.map((event) => event.job.progress)).toEqual(['p3', 'Working']);
    expect(events.at(-1)?.type).toBe('job_completed');
    expect(subscription.dropped).toBe(2);
  });

  it('gives every observer its own copy of the stream', async () => {
    const hub = new JobEventHub({ bufferSize: 4, logger: silentLogger });
    const first = hub.subscribe(baseJob.id);
    const second = hub.subscribe(baseJob.id);
    expect(hub.observerCount(baseJob.id)).toBe(2);
    expect(hub.observerCount()).toBe(2);

    hub.publish(progress('shared'));
    hub.publish(completed());

    const [a, b] = await Promise.all([collect(first), collect(second)]);
    expect(a).toEqual(b);
    expect(a.at(-1)?.type).toBe('job_completed');
    expect(hub.observerCount()).toBe(0);
  });

  it('late subscribers only see events published after they attach', async () => {
    const hub = new JobEventHub({ bufferSize: 4, logger: silentLogger });
    hub.publish(progress('before'));

    const subscription = hub.subscribe(baseJob.id);
    hub.publish(completed());

    const events = await collect(subscription);
    expect(events.map((event) => event.type)).toEqual(['job_completed']);
  });

  it('closeJob ends every observer of the job, including a waiting reader', async () => {
    const hub = new JobEventHub({ bufferSize: 4, logger: silentLogger });
    const buffered = hub.subscribe(baseJob.id);
    hub.publish(progress('queued'));
    const waiting = hub.subscribe(baseJob.id);

    const pending = waiting.next();
    hub.closeJob(baseJob.id);

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    await expect(collect(buffered)).resolves.toEqual([]);
    expect(hub.observerCount(baseJob.id)).toBe(0);
  });

  it('close() detaches the observer and is idempotent', async () => {
    const hub = new JobEventHub({ bufferSize: 4, logger: silentLogger });
    const subscription = hub.subscribe(baseJob.id);

    subscription.close();
    subscription.close();
    hub.publish(progress('ignored'));

    await expect(subscription.next()).resolves.toEqual({ value: undefined, done: true });
    expect(hub.observerCount()).toBe(0);
  });

  it('rejects a buffer smaller than one', () => {
    expect(() => new JobEventHub({ bufferSize: 0, logger: silentLogger })).toThrow(
      'Event buffer size must be at least 1 (got 0)',
    );
  });

  it('treats failed and completed events as terminal', () => {
    expect(isTerminalEvent(progress('x'))).toBe(false);
    expect(isTerminalEvent(completed())).toBe(true);
    expect(
      isTerminalEvent({
        type: 'job_failed',
        job: { ...baseJob, status: 'failed', error: { kind: 'permanent', message: 'x', stage: 'curate' } },
      }),
    ).toBe(true);
  });
});
