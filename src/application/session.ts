import type { Logger } from 'pino';
import { ContainerError } from '../domain/index.js';
import type { Destinations } from '../domain/index.js';
import { IngestionPipeline } from './ingestion-pipeline.js';
import type { StoppedState } from './ingestion-pipeline.js';
import type { LogShipper } from './log-shipper.js';
import type { LogLineSource } from './ports.js';

export interface SessionDeps {
  shipper: LogShipper;
  destinations: Destinations;
  source: LogLineSource;
  log: Logger;
  signal?: AbortSignal | undefined;
}

/**
 * Use case: provision the destinations, start the process and pipe its
 * output to the remote stream until it ends, fails, or is interrupted.
 *
 * Order:
 * 1) ensure group
 * 2) ensure stream
 * 3) start the process, unless already interrupted
 * 4) run the pipeline, then always close the source
 */
export async function runSession(deps: SessionDeps): Promise<StoppedState> {
  const { shipper, destinations, source, log, signal } = deps;
  const { group, stream } = destinations;

  const groupCreated = await shipper.ensureGroup(group);
  if (!groupCreated.ok) return { status: 'stopped', reason: 'error', error: groupCreated.error };
  log.info({ group: group.name }, `Log group ${groupCreated.value ? 'created' : 'found'}`);

  const streamCreated = await shipper.ensureStream(group, stream);
  if (!streamCreated.ok) return { status: 'stopped', reason: 'error', error: streamCreated.error };
  log.info({ stream: stream.name }, `Log stream ${streamCreated.value ? 'created' : 'found'}`);

  if (signal?.aborted) {
    log.info('Interrupted before the container started');
    return { status: 'stopped', reason: 'normal' };
  }

  try {
    await source.start();
  } catch (error: unknown) {
    const failure =
      error instanceof ContainerError
        ? error
        : new ContainerError('api-error', 'Container failed to start', { cause: error });
    return { status: 'stopped', reason: 'error', error: failure };
  }
  log.info('Container started');

  const pipeline = new IngestionPipeline({ shipper, group, stream, log });
  try {
    const outcome = await pipeline.start(source.lines(), signal);
    log.info({ shipped: pipeline.shippedCount, reason: outcome.reason }, 'Pipeline stopped');
    return outcome;
  } finally {
    await source.close();
  }
}
