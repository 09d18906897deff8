import yargs from 'yargs/yargs';
import { ConfigurationError, ok, err } from '../../domain/index.js';
import type { Result } from '../../domain/index.js';
import type { CliArgs } from '../../application/index.js';

/**
 * Parses the command line.
 *
 * yargs only knows the flags; whether the required ones are present is
 * decided by the config schema, so every missing-input failure surfaces
 * the same way. Unknown flags and commands fail here with a ConfigurationError.
 */
export function parseCliArgs(argv: readonly string[]): Result<CliArgs, ConfigurationError> {
  try {
    return ok(toCliArgs(argv));
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) return err(error);
    throw error;
  }
}

function toCliArgs(argv: readonly string[]): CliArgs {
  const parsed = yargs([...argv])
    .scriptName('logship')
    .usage('$0 <command> [options]')
    .command('run', 'Run a container and ship its output to a log stream')
    .command('fetch', 'Print the events stored in a log stream')
    .demandCommand(1, 'A command is required: run or fetch')
    .option('image', { type: 'string', describe: 'Docker image to run (must exist locally)' })
    .option('command', { type: 'string', describe: 'Shell command executed in the container' })
    .option('group', { type: 'string', describe: 'CloudWatch log group name' })
    .option('stream', { type: 'string', describe: 'CloudWatch log stream name' })
    .option('name', { type: 'string', describe: 'Container name' })
    .option('region', { type: 'string', describe: 'AWS region (default: $AWS_REGION or us-east-1)' })
    .option('endpoint', { type: 'string', describe: 'Custom endpoint URL (default: $AWS_ENDPOINT_URL)' })
    .option('access-key-id', { type: 'string', describe: 'AWS access key id' })
    .option('secret-access-key', { type: 'string', describe: 'AWS secret access key' })
    .option('session-token', { type: 'string', describe: 'AWS session token' })
    .option('dry-run', { type: 'boolean', default: false, describe: 'Ship to an in-process store instead of CloudWatch' })
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw new ConfigurationError(message || (error ? error.message : 'Invalid arguments'));
    })
    .parseSync();

  const [command] = parsed._;

  return {
    command: command === undefined ? undefined : String(command),
    image: parsed.image,
    shellCommand: parsed.command,
    group: parsed.group,
    stream: parsed.stream,
    containerName: parsed.name,
    dryRun: parsed['dry-run'],
    region: parsed.region,
    endpoint: parsed.endpoint,
    accessKeyId: parsed['access-key-id'],
    secretAccessKey: parsed['secret-access-key'],
    sessionToken: parsed['session-token'],
  };
}
