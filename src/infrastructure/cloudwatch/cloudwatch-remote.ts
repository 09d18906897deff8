import {
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  GetLogEventsCommand,
  PutLogEventsCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import type { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { z } from 'zod';
import { RemoteServiceError } from '../../domain/index.js';
import type { WireEvent } from '../../domain/index.js';
import type { CreateOutcome, LogsRemote, PutEventsAck } from '../../application/index.js';
import { isAlreadyExists, toRemoteServiceError } from './errors.js';

/** Shape of one event returned by GetLogEvents. */
const outputEventSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  message: z.string().default(''),
  ingestionTime: z.number().int().optional(),
});

/**
 * LogsRemote backed by AWS CloudWatch Logs.
 *
 * One SDK call per operation, first page only: the existence checks only
 * need to know whether any entry matches the prefix.
 */
export class CloudWatchLogsRemote implements LogsRemote {
  private readonly client: CloudWatchLogsClient;

  constructor(client: CloudWatchLogsClient) {
    this.client = client;
  }

  async listGroupsByPrefix(prefix: string): Promise<number> {
    try {
      const response = await this.client.send(
        new DescribeLogGroupsCommand({ logGroupNamePrefix: prefix }),
      );
      return response.logGroups?.length ?? 0;
    } catch (error: unknown) {
      throw toRemoteServiceError(error);
    }
  }

  async createGroup(name: string): Promise<CreateOutcome> {
    try {
      await this.client.send(new CreateLogGroupCommand({ logGroupName: name }));
      return 'created';
    } catch (error: unknown) {
      if (isAlreadyExists(error)) return 'already-exists';
      throw toRemoteServiceError(error);
    }
  }

  async listStreamsByPrefix(group: string, prefix: string): Promise<number> {
    try {
      const response = await this.client.send(
        new DescribeLogStreamsCommand({ logGroupName: group, logStreamNamePrefix: prefix }),
      );
      return response.logStreams?.length ?? 0;
    } catch (error: unknown) {
      throw toRemoteServiceError(error);
    }
  }

  async createStream(group: string, name: string): Promise<CreateOutcome> {
    try {
      await this.client.send(new CreateLogStreamCommand({ logGroupName: group, logStreamName: name }));
      return 'created';
    } catch (error: unknown) {
      if (isAlreadyExists(error)) return 'already-exists';
      throw toRemoteServiceError(error);
    }
  }

  async putEvents(group: string, stream: string, events: readonly WireEvent[]): Promise<PutEventsAck> {
    try {
      const response = await this.client.send(
        new PutLogEventsCommand({
          logGroupName: group,
          logStreamName: stream,
          logEvents: events.map((event) => ({ timestamp: event.timestamp, message: event.message })),
        }),
      );
      const rejected = response.rejectedLogEventsInfo;
      if (!rejected) return {};
      return {
        rejected: {
          tooNewStartIndex: rejected.tooNewLogEventStartIndex,
          tooOldEndIndex: rejected.tooOldLogEventEndIndex,
          expiredEndIndex: rejected.expiredLogEventEndIndex,
        },
      };
    } catch (error: unknown) {
      throw toRemoteServiceError(error);
    }
  }

  async getEvents(group: string, stream: string): Promise<WireEvent[]> {
    let events: unknown[];
    try {
      const response = await this.client.send(
        new GetLogEventsCommand({ logGroupName: group, logStreamName: stream, startFromHead: true }),
      );
      events = response.events ?? [];
    } catch (error: unknown) {
      throw toRemoteServiceError(error);
    }

    const parsed = z.array(outputEventSchema).safeParse(events);
    if (!parsed.success) {
      throw new RemoteServiceError('client-error', 'Malformed events in GetLogEvents response', {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
