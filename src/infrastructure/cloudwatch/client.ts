import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { RemoteServiceError, ok, err } from '../../domain/index.js';
import type { Result } from '../../domain/index.js';
import type { AwsSettings } from '../../application/index.js';

/**
 * Builds the CloudWatch Logs client.
 *
 * Static credentials are used only when both key and secret are given;
 * with neither, the SDK's default provider chain (env, shared config,
 * instance role) applies. One without the other is rejected up front.
 */
export function createCloudWatchClient(
  settings: AwsSettings,
): Result<CloudWatchLogsClient, RemoteServiceError> {
  const { accessKeyId, secretAccessKey, sessionToken } = settings;

  if ((accessKeyId === undefined) !== (secretAccessKey === undefined)) {
    return err(
      new RemoteServiceError(
        'credentials-partial',
        'Partial credentials found: both an access key id and a secret access key are required',
      ),
    );
  }

  const credentials =
    accessKeyId !== undefined && secretAccessKey !== undefined
      ? { accessKeyId, secretAccessKey, sessionToken }
      : undefined;

  return ok(
    new CloudWatchLogsClient({
      region: settings.region,
      endpoint: settings.endpoint,
      credentials,
    }),
  );
}
