import type { Logger } from 'pino';
import { ContainerError, createLogEvent, formatEvent } from '../domain/index.js';
import type { LogGroup, LogStream, PipelineError } from '../domain/index.js';
import type { LogShipper } from './log-shipper.js';
import { parseLogLine } from './line-parser.js';
import type { RawLogLine } from './ports.js';

export type StoppedState =
  | { readonly status: 'stopped'; readonly reason: 'normal' }
  | { readonly status: 'stopped'; readonly reason: 'error'; readonly error: PipelineError };

export type PipelineState =
  | { readonly status: 'not-started' }
  | { readonly status: 'running' }
  | StoppedState;

/** Dependencies bundled for the pipeline. */
export interface PipelineDeps {
  shipper: LogShipper;
  group: LogGroup;
  stream: LogStream;
  log: Logger;
}

/**
 * Line → parse → ship loop.
 *
 * Strictly sequential: a line is parsed and shipped, and the ship call
 * has returned, before the next line is pulled from the source. Slow
 * shipping therefore slows down reading the process output.
 *
 * Any parse or ship failure stops the loop for good. An abort signal or
 * the end of the line sequence stops it normally. Cancellation is
 * observed before each pull and right after it, never mid-shipment.
 * Only failures of the source itself become a `log-stream` error.
 */
export class IngestionPipeline {
  private readonly deps: PipelineDeps;
  private state: PipelineState = { status: 'not-started' };
  private shipped = 0;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  get current(): PipelineState {
    return this.state;
  }

  /** Number of events acknowledged by the remote so far. */
  get shippedCount(): number {
    return this.shipped;
  }

  async start(lines: AsyncIterable<RawLogLine>, signal?: AbortSignal): Promise<StoppedState> {
    if (this.state.status !== 'not-started') {
      throw new Error(`Pipeline cannot start from state '${this.state.status}'`);
    }
    this.state = { status: 'running' };
    const { shipper, group, stream, log } = this.deps;

    const iterator = lines[Symbol.asyncIterator]();
    try {
      while (!signal?.aborted) {
        let next: IteratorResult<RawLogLine>;
        try {
          next = await iterator.next();
        } catch (error: unknown) {
          // Closing the source on abort may tear the stream down mid-read.
          if (signal?.aborted) break;
          return this.stop(
            new ContainerError('log-stream', 'Reading container output failed', { cause: error }),
          );
        }
        if (next.done || signal?.aborted) break;
        const line = next.value;

        const parsed = parseLogLine(line.text, line.receivedAt);
        if (!parsed.ok) return this.stop(parsed.error);

        const event = createLogEvent(parsed.value);
        const ack = await shipper.putEvents(group, stream, [event]);
        if (!ack.ok) return this.stop(ack.error);

        this.shipped++;
        if (ack.value.rejected) {
          log.warn({ rejected: ack.value.rejected, timestamp: event.timestamp }, 'Event rejected by remote');
        }
        log.info(formatEvent(event));
      }
    } finally {
      await iterator.return?.();
    }

    return this.stop();
  }

  private stop(error?: PipelineError): StoppedState {
    const stopped: StoppedState = error
      ? { status: 'stopped', reason: 'error', error }
      : { status: 'stopped', reason: 'normal' };
    this.state = stopped;
    return stopped;
  }
}
