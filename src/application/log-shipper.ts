import {
  GroupExistsError,
  GroupNotFoundError,
  StreamExistsError,
  StreamNotFoundError,
  fromWireEvent,
  toWireEvent,
  ok,
  err,
} from '../domain/index.js';
import type {
  InvalidNameError,
  LogEvent,
  LogGroup,
  LogStream,
  RemoteServiceError,
  Result,
} from '../domain/index.js';
import { DestinationCache } from './destination-cache.js';
import { validateGroupName, validateStreamName } from './name-rules.js';
import type { LogsRemote, PutEventsAck } from './ports.js';
import { callRemote } from './remote-call.js';

/**
 * Ships events to a remote log service.
 *
 * The remote client is injected; every operation checks the cached
 * existence of its destinations before acting. Nothing is retried.
 */
export class LogShipper {
  private readonly remote: LogsRemote;
  private readonly cache: DestinationCache;

  constructor(remote: LogsRemote, cache: DestinationCache = new DestinationCache(remote)) {
    this.remote = remote;
    this.cache = cache;
  }

  /**
   * Creates the group unless it already exists.
   * Returns `true` when a create call was made, `false` when the group was found.
   */
  async ensureGroup(
    group: LogGroup,
  ): Promise<Result<boolean, InvalidNameError | GroupExistsError | RemoteServiceError>> {
    const name = validateGroupName(group.name);
    if (!name.ok) return name;

    const exists = await this.cache.groupExists(group);
    if (!exists.ok) return exists;
    if (exists.value) return ok(false);

    const created = await callRemote(() => this.remote.createGroup(group.name));
    if (!created.ok) return created;
    // Check-then-create is not atomic: someone else created it in between.
    if (created.value === 'already-exists') return err(new GroupExistsError(group.name));

    this.cache.markCreated(group);
    return ok(true);
  }

  async ensureStream(
    group: LogGroup,
    stream: LogStream,
  ): Promise<
    Result<boolean, InvalidNameError | GroupNotFoundError | StreamExistsError | RemoteServiceError>
  > {
    const name = validateStreamName(stream.name);
    if (!name.ok) return name;

    const groupFound = await this.cache.groupExists(group);
    if (!groupFound.ok) return groupFound;
    if (!groupFound.value) return err(new GroupNotFoundError(group.name));

    const exists = await this.cache.streamExists(group, stream);
    if (!exists.ok) return exists;
    if (exists.value) return ok(false);

    const created = await callRemote(() => this.remote.createStream(group.name, stream.name));
    if (!created.ok) return created;
    if (created.value === 'already-exists') return err(new StreamExistsError(stream.name));

    this.cache.markCreated(stream);
    return ok(true);
  }

  /**
   * Appends events in exactly the order given. The remote expects
   * non-decreasing timestamps within a call; reordering is the caller's business.
   */
  async putEvents(
    group: LogGroup,
    stream: LogStream,
    events: readonly LogEvent[],
  ): Promise<Result<PutEventsAck, GroupNotFoundError | StreamNotFoundError | RemoteServiceError>> {
    const found = await this.requireDestinations(group, stream);
    if (!found.ok) return found;

    if (events.length === 0) return ok({});

    return callRemote(() => this.remote.putEvents(group.name, stream.name, events.map(toWireEvent)));
  }

  /** Reads a stream back in the order the remote reports. */
  async getEvents(
    group: LogGroup,
    stream: LogStream,
  ): Promise<Result<LogEvent[], GroupNotFoundError | StreamNotFoundError | RemoteServiceError>> {
    const found = await this.requireDestinations(group, stream);
    if (!found.ok) return found;

    const events = await callRemote(() => this.remote.getEvents(group.name, stream.name));
    if (!events.ok) return events;

    return ok(events.value.map(fromWireEvent));
  }

  private async requireDestinations(
    group: LogGroup,
    stream: LogStream,
  ): Promise<Result<true, GroupNotFoundError | StreamNotFoundError | RemoteServiceError>> {
    const groupFound = await this.cache.groupExists(group);
    if (!groupFound.ok) return groupFound;
    if (!groupFound.value) return err(new GroupNotFoundError(group.name));

    const streamFound = await this.cache.streamExists(group, stream);
    if (!streamFound.ok) return streamFound;
    if (!streamFound.value) return err(new StreamNotFoundError(stream.name));

    return ok(true);
  }
}
