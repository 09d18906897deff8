import { z } from 'zod';
import { ConfigurationError, ok, err } from '../domain/index.js';
import type { Result } from '../domain/index.js';
import { isValidPlainName, PLAIN_ALLOWED } from './name-rules.js';

export const DEFAULT_REGION = 'us-east-1';

const required = (field: string) => z.string().trim().min(1, `${field} is required`);

/** Region, endpoint and static credentials for the remote log service. */
export const awsSettingsSchema = z.object({
  region: z.string().trim().min(1).default(DEFAULT_REGION),
  endpoint: z.string().url({ message: 'endpoint must be a valid URL' }).optional(),
  accessKeyId: z.string().min(1).optional(),
  secretAccessKey: z.string().min(1).optional(),
  sessionToken: z.string().min(1).optional(),
});

export type AwsSettings = z.infer<typeof awsSettingsSchema>;

/**
 * `run`: start a container and ship its output.
 *
 * - `containerName` is optional; Docker picks one when absent.
 * - `dryRun` ships to an in-process store instead of the remote service.
 */
export const runConfigSchema = z.object({
  command: z.literal('run'),
  image: required('image'),
  shellCommand: required('command'),
  group: required('group'),
  stream: required('stream'),
  containerName: z
    .string()
    .refine(isValidPlainName, { message: `container name may only contain ${PLAIN_ALLOWED}` })
    .optional(),
  dryRun: z.boolean().default(false),
  aws: awsSettingsSchema,
});

/** `fetch`: print the events stored in a stream. */
export const fetchConfigSchema = z.object({
  command: z.literal('fetch'),
  group: required('group'),
  stream: required('stream'),
  aws: awsSettingsSchema,
});

export const cliConfigSchema = z.discriminatedUnion('command', [runConfigSchema, fetchConfigSchema]);

export type RunConfig = z.infer<typeof runConfigSchema>;
export type FetchConfig = z.infer<typeof fetchConfigSchema>;
export type CliConfig = z.infer<typeof cliConfigSchema>;

/** Raw values as they come off the command line. */
export interface CliArgs {
  command?: string | undefined;
  image?: string | undefined;
  shellCommand?: string | undefined;
  group?: string | undefined;
  stream?: string | undefined;
  containerName?: string | undefined;
  dryRun?: boolean | undefined;
  region?: string | undefined;
  endpoint?: string | undefined;
  accessKeyId?: string | undefined;
  secretAccessKey?: string | undefined;
  sessionToken?: string | undefined;
}

/**
 * Merges CLI values over environment fallbacks and validates the result.
 * Runs before anything touches Docker or the remote service.
 */
export function loadConfig(
  args: CliArgs,
  env: Record<string, string | undefined>,
): Result<CliConfig, ConfigurationError> {
  const parsed = cliConfigSchema.safeParse({
    command: args.command,
    image: args.image,
    shellCommand: args.shellCommand,
    group: args.group,
    stream: args.stream,
    containerName: args.containerName,
    dryRun: args.dryRun,
    aws: {
      region: args.region ?? nonEmpty(env['AWS_REGION']),
      endpoint: args.endpoint ?? nonEmpty(env['AWS_ENDPOINT_URL']),
      accessKeyId: args.accessKeyId,
      secretAccessKey: args.secretAccessKey,
      sessionToken: args.sessionToken,
    },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return err(new ConfigurationError('Invalid configuration', issues));
  }

  return ok(parsed.data);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
