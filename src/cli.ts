#!/usr/bin/env node
import Docker from 'dockerode';
import pino from 'pino';
import type { Logger } from 'pino';
import { createDestinations, formatEvent } from './domain/index.js';
import type { PipelineError, RemoteServiceError, Result } from './domain/index.js';
import { LogShipper, fetchEvents, loadConfig, runSession } from './application/index.js';
import type { AwsSettings, FetchConfig, LogsRemote, RunConfig } from './application/index.js';
import {
  CloudWatchLogsRemote,
  DockerContainerSource,
  InMemoryLogsRemote,
  createCloudWatchClient,
} from './infrastructure/index.js';
import { parseCliArgs } from './interfaces/cli/index.js';

/**
 * Command-line entry point.
 *
 * Every failure ends up here: it is logged once at fatal level and the
 * process exits 1. An interrupt or the container's output ending is a
 * normal stop and exits 0.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

// Abort controller for SIGINT / SIGTERM
const ac = new AbortController();

function createRemote(settings: AwsSettings, dryRun: boolean): Result<LogsRemote, RemoteServiceError> {
  if (dryRun) return { ok: true, value: new InMemoryLogsRemote() };

  const client = createCloudWatchClient(settings);
  if (!client.ok) return client;
  log.info({ region: settings.region, endpoint: settings.endpoint }, 'Connection to CloudWatch established');
  return { ok: true, value: new CloudWatchLogsRemote(client.value) };
}

function fail(error: PipelineError | RemoteServiceError): number {
  log.fatal({ err: error, code: error.code }, error.message);
  return 1;
}

async function runCommand(config: RunConfig): Promise<number> {
  const remote = createRemote(config.aws, config.dryRun);
  if (!remote.ok) return fail(remote.error);

  const source = new DockerContainerSource(
    new Docker(),
    { image: config.image, command: config.shellCommand, name: config.containerName },
    log,
  );

  const shutdown = (): void => {
    log.info('Interrupted, closing container output…');
    ac.abort();
    source.close().catch((err: unknown) => {
      log.error({ err }, 'Failed to close container output');
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const outcome = await runSession({
    shipper: new LogShipper(remote.value),
    destinations: createDestinations(config.group, config.stream),
    source,
    log,
    signal: ac.signal,
  });

  return outcome.reason === 'error' ? fail(outcome.error) : 0;
}

async function fetchCommand(config: FetchConfig): Promise<number> {
  const remote = createRemote(config.aws, false);
  if (!remote.ok) return fail(remote.error);

  const events = await fetchEvents(
    new LogShipper(remote.value),
    createDestinations(config.group, config.stream),
  );
  if (!events.ok) return fail(events.error);

  for (const event of events.value) {
    process.stdout.write(`${formatEvent(event)}\n`);
  }
  return 0;
}

async function main(logger: Logger): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.ok) {
    logger.fatal({ issues: args.error.issues }, args.error.message);
    return 1;
  }

  const config = loadConfig(args.value, process.env);
  if (!config.ok) {
    logger.fatal({ issues: config.error.issues }, config.error.message);
    return 1;
  }

  return config.value.command === 'run' ? runCommand(config.value) : fetchCommand(config.value);
}

main(log)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.fatal({ err }, 'logship crashed');
    process.exitCode = 1;
  });
