import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runSession } from '../../src/application/session.js';
import { LogShipper } from '../../src/application/log-shipper.js';
import { InMemoryLogsRemote } from '../../src/infrastructure/memory/index.js';
import { ContainerError, InvalidNameError, createDestinations } from '../../src/domain/index.js';
import type { LogLineSource } from '../../src/application/index.js';
import { FIXED_NOW, fakeLogger, linesFrom } from '../helpers.js';

/** Source fake that replays fixed lines. */
function fakeSource(lines: string[]) {
  return {
    start: vi.fn().mockResolvedValue(undefined),
    lines: vi.fn(() => linesFrom(lines)),
    close: vi.fn().mockResolvedValue(undefined),
  } satisfies LogLineSource;
}

describe('runSession', () => {
  let remote: InMemoryLogsRemote;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    remote = new InMemoryLogsRemote(() => FIXED_NOW);
    log = fakeLogger();
  });

  it('provisions destinations, starts the source and ships its lines', async () => {
    const source = fakeSource(['hello', 'world']);

    const outcome = await runSession({
      shipper: new LogShipper(remote),
      destinations: createDestinations('app', 'web'),
      source,
      log,
    });

    expect(outcome).toEqual({ status: 'stopped', reason: 'normal' });
    expect(log.info).toHaveBeenCalledWith({ group: 'app' }, 'Log group created');
    expect(log.info).toHaveBeenCalledWith({ stream: 'web' }, 'Log stream created');
    expect(source.start).toHaveBeenCalledTimes(1);
    expect(source.close).toHaveBeenCalledTimes(1);
    expect((await remote.getEvents('app', 'web')).map((e) => e.message)).toEqual(['hello', 'world']);
  });

  it('reports existing destinations as found', async () => {
    remote.seed('app', 'web');

    await runSession({
      shipper: new LogShipper(remote),
      destinations: createDestinations('app', 'web'),
      source: fakeSource([]),
      log,
    });

    expect(log.info).toHaveBeenCalledWith({ group: 'app' }, 'Log group found');
    expect(log.info).toHaveBeenCalledWith({ stream: 'web' }, 'Log stream found');
  });

  it('does not start the source when provisioning fails', async () => {
    const source = fakeSource(['hello']);

    const outcome = await runSession({
      shipper: new LogShipper(remote),
      destinations: createDestinations('x', 'web'),
      source,
      log,
    });

    expect(outcome.reason).toBe('error');
    if (outcome.reason !== 'error') return;
    expect(outcome.error).toBeInstanceOf(InvalidNameError);
    expect(source.start).not.toHaveBeenCalled();
  });

  it('returns a container start failure as an error stop', async () => {
    const source = fakeSource([]);
    const failure = new ContainerError('image-not-found', 'Image not found');
    source.start.mockRejectedValueOnce(failure);

    const outcome = await runSession({
      shipper: new LogShipper(remote),
      destinations: createDestinations('app', 'web'),
      source,
      log,
    });

    expect(outcome).toEqual({ status: 'stopped', reason: 'error', error: failure });
    expect(source.lines).not.toHaveBeenCalled();
  });

  it('wraps an unexpected start failure', async () => {
    const source = fakeSource([]);
    source.start.mockRejectedValueOnce(new Error('connect ENOENT /var/run/docker.sock'));

    const outcome = await runSession({
      shipper: new LogShipper(remote),
      destinations: createDestinations('app', 'web'),
      source,
      log,
    });

    expect(outcome.reason).toBe('error');
    if (outcome.reason !== 'error') return;
    expect(outcome.error).toBeInstanceOf(ContainerError);
    expect(outcome.error.message).toBe('Container failed to start');
  });

  it('does not start the container once interrupted', async () => {
    const source = fakeSource(['hello']);
    const ac = new AbortController();
    ac.abort();

    const outcome = await runSession({
      shipper: new LogShipper(remote),
      destinations: createDestinations('app', 'web'),
      source,
      log,
      signal: ac.signal,
    });

    expect(outcome).toEqual({ status: 'stopped', reason: 'normal' });
    expect(source.start).not.toHaveBeenCalled();
    expect(source.lines).not.toHaveBeenCalled();
  });
});
