import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  GetLogEventsCommand,
  PutLogEventsCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import { CloudWatchLogsRemote, createCloudWatchClient, toRemoteServiceError } from '../../src/infrastructure/cloudwatch/index.js';
import { RemoteServiceError } from '../../src/domain/index.js';

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('CloudWatchLogsRemote', () => {
  let send: ReturnType<typeof vi.fn>;
  let remote: CloudWatchLogsRemote;

  beforeEach(() => {
    send = vi.fn();
    remote = new CloudWatchLogsRemote({ send } as unknown as CloudWatchLogsClient);
  });

  function sentCommand(): unknown {
    return send.mock.calls[0]?.[0];
  }

  it('counts groups matching a prefix', async () => {
    send.mockResolvedValueOnce({ logGroups: [{ logGroupName: 'app' }, { logGroupName: 'app-2' }] });

    await expect(remote.listGroupsByPrefix('app')).resolves.toBe(2);

    const command = sentCommand();
    expect(command).toBeInstanceOf(DescribeLogGroupsCommand);
    if (!(command instanceof DescribeLogGroupsCommand)) return;
    expect(command.input).toEqual({ logGroupNamePrefix: 'app' });
  });

  it('counts zero when the response has no groups', async () => {
    send.mockResolvedValueOnce({});
    await expect(remote.listGroupsByPrefix('app')).resolves.toBe(0);
  });

  it('counts streams matching a prefix', async () => {
    send.mockResolvedValueOnce({ logStreams: [{ logStreamName: 'web' }] });

    await expect(remote.listStreamsByPrefix('app', 'web')).resolves.toBe(1);

    const command = sentCommand();
    expect(command).toBeInstanceOf(DescribeLogStreamsCommand);
    if (!(command instanceof DescribeLogStreamsCommand)) return;
    expect(command.input).toEqual({ logGroupName: 'app', logStreamNamePrefix: 'web' });
  });

  it('creates a group', async () => {
    send.mockResolvedValueOnce({});

    await expect(remote.createGroup('app')).resolves.toBe('created');
    expect(sentCommand()).toBeInstanceOf(CreateLogGroupCommand);
  });

  it('reports an existing group instead of failing', async () => {
    send.mockRejectedValueOnce(namedError('ResourceAlreadyExistsException', 'The specified log group already exists'));
    await expect(remote.createGroup('app')).resolves.toBe('already-exists');
  });

  it('reports an existing stream instead of failing', async () => {
    send.mockRejectedValueOnce(namedError('ResourceAlreadyExistsException', 'The specified log stream already exists'));

    await expect(remote.createStream('app', 'web')).resolves.toBe('already-exists');
    expect(sentCommand()).toBeInstanceOf(CreateLogStreamCommand);
  });

  it('translates other failures', async () => {
    send.mockRejectedValueOnce(namedError('ResourceNotFoundException', 'The specified log group does not exist.'));

    const failure = remote.createStream('app', 'web');

    await expect(failure).rejects.toBeInstanceOf(RemoteServiceError);
    await expect(failure).rejects.toMatchObject({ kind: 'client-error', message: 'The specified log group does not exist.' });
  });

  it('sends events without ingestion time, in order', async () => {
    send.mockResolvedValueOnce({});

    await expect(
      remote.putEvents('app', 'web', [
        { timestamp: 1, message: 'a', ingestionTime: 9 },
        { timestamp: 2, message: 'b' },
      ]),
    ).resolves.toEqual({});

    const command = sentCommand();
    expect(command).toBeInstanceOf(PutLogEventsCommand);
    if (!(command instanceof PutLogEventsCommand)) return;
    expect(command.input).toEqual({
      logGroupName: 'app',
      logStreamName: 'web',
      logEvents: [
        { timestamp: 1, message: 'a' },
        { timestamp: 2, message: 'b' },
      ],
    });
  });

  it('passes rejected-event indexes through', async () => {
    send.mockResolvedValueOnce({ rejectedLogEventsInfo: { tooOldLogEventEndIndex: 0 } });

    const ack = await remote.putEvents('app', 'web', [{ timestamp: 1, message: 'a' }]);

    expect(ack.rejected?.tooOldEndIndex).toBe(0);
    expect(ack.rejected?.tooNewStartIndex).toBeUndefined();
  });

  it('reads events from the head of the stream', async () => {
    send.mockResolvedValueOnce({
      events: [
        { timestamp: 10, message: 'first', ingestionTime: 20 },
        { timestamp: 11, ingestionTime: 21 },
      ],
    });

    await expect(remote.getEvents('app', 'web')).resolves.toEqual([
      { timestamp: 10, message: 'first', ingestionTime: 20 },
      { timestamp: 11, message: '', ingestionTime: 21 },
    ]);

    const command = sentCommand();
    expect(command).toBeInstanceOf(GetLogEventsCommand);
    if (!(command instanceof GetLogEventsCommand)) return;
    expect(command.input).toEqual({ logGroupName: 'app', logStreamName: 'web', startFromHead: true });
  });

  it('rejects malformed events', async () => {
    send.mockResolvedValueOnce({ events: [{ message: 'no timestamp' }] });

    await expect(remote.getEvents('app', 'web')).rejects.toMatchObject({
      kind: 'client-error',
      message: 'Malformed events in GetLogEvents response',
    });
  });
});

describe('toRemoteServiceError', () => {
  it('keeps an already translated error', () => {
    const error = new RemoteServiceError('credentials-partial', 'partial');
    expect(toRemoteServiceError(error)).toBe(error);
  });

  it('classifies a missing profile', () => {
    const error = toRemoteServiceError(namedError('CredentialsProviderError', 'Profile staging could not be found'));
    expect(error.kind).toBe('profile-not-found');
  });

  it('classifies missing credentials', () => {
    const error = toRemoteServiceError(namedError('CredentialsProviderError', 'Could not load credentials from any providers'));
    expect(error.kind).toBe('credentials-missing');
    expect(error.message).toBe('Could not load credentials from any providers');
  });

  it.each(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT'])('classifies %s as unreachable', (code) => {
    const error = Object.assign(new Error(`connect ${code}`), { code });
    expect(toRemoteServiceError(error).kind).toBe('endpoint-unreachable');
  });

  it('classifies an SDK timeout as unreachable', () => {
    expect(toRemoteServiceError(namedError('TimeoutError', 'timed out')).kind).toBe('endpoint-unreachable');
  });

  it('falls back to client-error for anything else', () => {
    const error = toRemoteServiceError('boom');
    expect(error.kind).toBe('client-error');
    expect(error.message).toBe('boom');
  });
});

describe('createCloudWatchClient', () => {
  it('builds a client from complete settings', () => {
    const result = createCloudWatchClient({
      region: 'us-east-1',
      endpoint: 'http://localhost:4566',
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBeInstanceOf(CloudWatchLogsClient);
  });

  it('builds a client relying on the default credential chain', () => {
    expect(createCloudWatchClient({ region: 'us-east-1' }).ok).toBe(true);
  });

  it.each([
    { accessKeyId: 'test-key' },
    { secretAccessKey: 'test-secret' },
  ])('rejects partial credentials %o', (credentials) => {
    const result = createCloudWatchClient({ region: 'us-east-1', ...credentials });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('credentials-partial');
  });
});
