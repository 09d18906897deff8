import type { WireEvent } from '../domain/index.js';

/** Result of a create call against the remote service. */
export type CreateOutcome = 'created' | 'already-exists';

/** Indices of events the remote refused to store, if any. */
export interface RejectedEventsInfo {
  readonly tooNewStartIndex?: number | undefined;
  readonly tooOldEndIndex?: number | undefined;
  readonly expiredEndIndex?: number | undefined;
}

/** Acknowledgment of an append call. Opaque to the pipeline apart from rejections. */
export interface PutEventsAck {
  readonly rejected?: RejectedEventsInfo | undefined;
}

/**
 * Remote log-aggregation service, reduced to the calls the shipper needs.
 *
 * Implementations reject only with `RemoteServiceError`; a create call
 * that races an out-of-band creation resolves `'already-exists'`.
 */
export interface LogsRemote {
  listGroupsByPrefix(prefix: string): Promise<number>;
  createGroup(name: string): Promise<CreateOutcome>;
  listStreamsByPrefix(group: string, prefix: string): Promise<number>;
  createStream(group: string, name: string): Promise<CreateOutcome>;
  putEvents(group: string, stream: string, events: readonly WireEvent[]): Promise<PutEventsAck>;
  getEvents(group: string, stream: string): Promise<WireEvent[]>;
}

/** One line of process output, tagged with its arrival time (epoch ms). */
export interface RawLogLine {
  readonly text: string;
  readonly receivedAt: number;
}

/**
 * Live process producing log lines.
 *
 * `lines()` is pulled one line at a time: it completes when the process
 * output ends and rejects if reading fails. `close()` ends the sequence early.
 */
export interface LogLineSource {
  start(): Promise<void>;
  lines(): AsyncIterable<RawLogLine>;
  close(): Promise<void>;
}
