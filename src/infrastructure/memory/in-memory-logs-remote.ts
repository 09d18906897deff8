import type { WireEvent } from '../../domain/index.js';
import { RemoteServiceError } from '../../domain/index.js';
import type { CreateOutcome, LogsRemote, PutEventsAck } from '../../application/index.js';

/**
 * In-process LogsRemote.
 *
 * Backs `--dry-run` and the tests. Stored events receive an ingestion
 * time from `now()`; `calls` records every operation in order.
 */
export class InMemoryLogsRemote implements LogsRemote {
  private readonly groups = new Map<string, Map<string, WireEvent[]>>();
  private readonly now: () => number;
  readonly calls: string[] = [];

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async listGroupsByPrefix(prefix: string): Promise<number> {
    this.calls.push('listGroupsByPrefix');
    return [...this.groups.keys()].filter((name) => name.startsWith(prefix)).length;
  }

  async createGroup(name: string): Promise<CreateOutcome> {
    this.calls.push('createGroup');
    if (this.groups.has(name)) return 'already-exists';
    this.groups.set(name, new Map());
    return 'created';
  }

  async listStreamsByPrefix(group: string, prefix: string): Promise<number> {
    this.calls.push('listStreamsByPrefix');
    const streams = this.requireGroup(group);
    return [...streams.keys()].filter((name) => name.startsWith(prefix)).length;
  }

  async createStream(group: string, name: string): Promise<CreateOutcome> {
    this.calls.push('createStream');
    const streams = this.requireGroup(group);
    if (streams.has(name)) return 'already-exists';
    streams.set(name, []);
    return 'created';
  }

  async putEvents(group: string, stream: string, events: readonly WireEvent[]): Promise<PutEventsAck> {
    this.calls.push('putEvents');
    const stored = this.requireStream(group, stream);
    const ingestionTime = this.now();
    for (const event of events) {
      stored.push({ timestamp: event.timestamp, message: event.message, ingestionTime });
    }
    return {};
  }

  async getEvents(group: string, stream: string): Promise<WireEvent[]> {
    this.calls.push('getEvents');
    return this.requireStream(group, stream).map((event) => ({ ...event }));
  }

  /** Seeds a group (and optionally a stream) as if created out-of-band. */
  seed(group: string, stream?: string): void {
    const streams = this.groups.get(group) ?? new Map<string, WireEvent[]>();
    this.groups.set(group, streams);
    if (stream !== undefined && !streams.has(stream)) {
      streams.set(stream, []);
    }
  }

  private requireGroup(group: string): Map<string, WireEvent[]> {
    const streams = this.groups.get(group);
    if (!streams) {
      throw new RemoteServiceError('client-error', `The specified log group does not exist: ${group}`);
    }
    return streams;
  }

  private requireStream(group: string, stream: string): WireEvent[] {
    const events = this.requireGroup(group).get(stream);
    if (!events) {
      throw new RemoteServiceError('client-error', `The specified log stream does not exist: ${stream}`);
    }
    return events;
  }
}
