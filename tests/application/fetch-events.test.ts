import { describe, it, expect } from 'vitest';
import { fetchEvents } from '../../src/application/fetch-events.js';
import { LogShipper } from '../../src/application/log-shipper.js';
import { InMemoryLogsRemote } from '../../src/infrastructure/memory/index.js';
import { StreamNotFoundError, createDestinations } from '../../src/domain/index.js';

describe('fetchEvents', () => {
  it('reads the stream back', async () => {
    const remote = new InMemoryLogsRemote(() => 500);
    remote.seed('app', 'web');
    await remote.putEvents('app', 'web', [{ timestamp: 100, message: 'stored' }]);

    const result = await fetchEvents(new LogShipper(remote), createDestinations('app', 'web'));

    expect(result).toEqual({ ok: true, value: [{ timestamp: 100, message: 'stored', ingestionTime: 500 }] });
  });

  it('fails when the stream is missing', async () => {
    const remote = new InMemoryLogsRemote();
    remote.seed('app');

    const result = await fetchEvents(new LogShipper(remote), createDestinations('app', 'web'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StreamNotFoundError);
    expect(remote.calls).not.toContain('getEvents');
  });
});
