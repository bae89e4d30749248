import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { RedisExtractionRepository } from './redis.js';
import { enrich } from '../lib/enrichment.js';
import { JobStateError } from '../errors.js';

const Command = z.array(z.string()).min(1);

/** In-process stand-in for the Upstash REST endpoint, covering the commands the repository sends. */
class FakeUpstash {
  strings = new Map<string, string>();
  lists = new Map<string, string[]>();
  zsets = new Map<string, Map<string, number>>();
  commands: string[][] = [];
  authHeaders: string[] = [];

  handle(command: string[]): unknown {
    const [name, key = '', ...args] = command;
    switch (name) {
      case 'SET': {
        if (args[1] === 'NX' && this.strings.has(key)) return null;
        this.strings.set(key, args[0] ?? '');
        return 'OK';
      }
      case 'GET':
        return this.strings.get(key) ?? null;
      case 'MGET':
        return [key, ...args].map(k => this.strings.get(k) ?? null);
      case 'ZADD': {
        const zset = this.zsets.get(key) ?? new Map<string, number>();
        zset.set(args[1] ?? '', Number(args[0]));
        this.zsets.set(key, zset);
        return 1;
      }
      case 'ZRANGE':
      case 'ZREVRANGE': {
        const members = Array.from(this.zsets.get(key) ?? new Map<string, number>())
          .sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]))
          .map(([member]) => member);
        if (name === 'ZREVRANGE') members.reverse();
        const start = Number(args[0]);
        const stop = Number(args[1]);
        return members.slice(start, stop === -1 ? undefined : stop + 1);
      }
      case 'RPUSH': {
        const list = this.lists.get(key) ?? [];
        list.push(...args);
        this.lists.set(key, list);
        return list.length;
      }
      case 'LRANGE':
        return [...(this.lists.get(key) ?? [])];
      default:
        throw new Error(`Unexpected command ${name}`);
    }
  }

  fetch = async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const command = Command.parse(JSON.parse(String(init?.body)));
    this.commands.push(command);
    this.authHeaders.push(new Headers(init?.headers).get('authorization') ?? '');
    return new Response(JSON.stringify({ result: this.handle(command) }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };
}

const NOW = new Date('2026-04-04T04:04:04.000Z');

describe('RedisExtractionRepository', () => {
  let upstash: FakeUpstash;
  let repo: RedisExtractionRepository;

  beforeEach(() => {
    upstash = new FakeUpstash();
    vi.stubGlobal('fetch', upstash.fetch);
    repo = new RedisExtractionRepository('https://redis.example.test/', 'test-token', 'test');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should create and read back a job', async () => {
    const created = await repo.createJob('job_1', 4);
    const loaded = await repo.getJob('job_1');

    expect(loaded).toEqual(created);
    expect(upstash.commands[0]?.slice(0, 2)).toEqual(['SET', 'test:job:job_1']);
    expect(upstash.commands[0]?.[3]).toBe('NX');
    expect(upstash.commands[1]?.[0]).toBe('ZADD');
    expect(upstash.authHeaders[0]).toBe('Bearer test-token');
  });

  it('should refuse a duplicate job id', async () => {
    await repo.createJob('job_1', 1);
    await expect(repo.createJob('job_1', 1)).rejects.toBeInstanceOf(JobStateError);
  });

  it('should return null for a missing job', async () => {
    expect(await repo.getJob('job_missing')).toBeNull();
    expect(await repo.updateJob('job_missing', { status: 'completed' })).toBeNull();
  });

  it('should apply the same transition rules as the memory store', async () => {
    await repo.createJob('job_1', 2);
    await repo.updateJob('job_1', { status: 'processing', processed: 1 });
    const done = await repo.updateJob('job_1', { status: 'completed', processed: 1, failed: 1 });

    expect(done).toMatchObject({ status: 'completed', processedCount: 1, failedCount: 1 });
    expect(done?.completedAt).toBeInstanceOf(Date);
    await expect(repo.updateJob('job_1', { status: 'processing' })).rejects.toBeInstanceOf(JobStateError);

    const stored = await repo.getJob('job_1');
    expect(stored?.completedAt?.toISOString()).toBe(done?.completedAt?.toISOString());
  });

  it('should round-trip records and failures in order', async () => {
    await repo.createJob('job_1', 3);
    const first = await repo.saveRecord('job_1', enrich({ mcNumber: '11', companyName: 'One', violations12mo: 4 }, NOW));
    await repo.saveRecord('job_1', enrich({ mcNumber: '22', companyName: 'Two' }, NOW));
    await repo.saveFailure('job_1', '33', 'MC 33 not found (after 3 retries)', 3);

    const records = await repo.getRecords('job_1');
    expect(records.map(r => r.mcNumber)).toEqual(['11', '22']);
    expect(records[0]).toEqual(first);
    expect(records[0]?.extractedDate).toEqual(NOW);
    expect(upstash.lists.has('test:job:job_1:records')).toBe(true);

    const failures = await repo.getFailures('job_1');
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ jobId: 'job_1', mcNumber: '33', retryCount: 3 });
    expect(failures[0]?.failedAt).toBeInstanceOf(Date);
  });

  it('should list jobs newest first and count by status', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    try {
      vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      await repo.createJob('job_old', 1);
      vi.setSystemTime(new Date('2026-01-02T00:00:00.000Z'));
      await repo.createJob('job_new', 1);
      await repo.updateJob('job_old', { status: 'failed', errorMessage: 'source unavailable' });
    } finally {
      vi.useRealTimers();
    }

    expect((await repo.listJobs()).map(j => j.id)).toEqual(['job_new', 'job_old']);
    expect((await repo.listJobs({ limit: 1 })).map(j => j.id)).toEqual(['job_new']);
    expect(await repo.getStats()).toEqual({ processing: 1, completed: 0, failed: 1, cancelled: 0 });
  });

  it('should surface an error reply', async () => {
    vi.stubGlobal('fetch', async () => new Response(JSON.stringify({ error: 'WRONGPASS invalid password' }), { status: 200 }));

    await expect(repo.getJob('job_1')).rejects.toThrow('Redis error: WRONGPASS invalid password');
  });

  it('should surface an HTTP failure', async () => {
    vi.stubGlobal('fetch', async () => new Response('unauthorized', { status: 401, statusText: 'Unauthorized' }));

    await expect(repo.getStats()).rejects.toThrow('Redis request failed: 401 Unauthorized');
  });
});
