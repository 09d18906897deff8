import { Existence, GroupNotFoundError, ok, err } from '../domain/index.js';
import type { LogGroup, LogStream, RemoteServiceError, Result } from '../domain/index.js';
import type { LogsRemote } from './ports.js';
import { callRemote } from './remote-call.js';

/**
 * Existence checks for a group and its stream, cached on the destination
 * objects themselves.
 *
 * "Exists" means the remote lists at least one entry whose name starts
 * with the destination's name, so `app` reads as existing when only
 * `app-prod` is there.
 */
export class DestinationCache {
  private readonly remote: LogsRemote;

  constructor(remote: LogsRemote) {
    this.remote = remote;
  }

  async groupExists(group: LogGroup): Promise<Result<boolean, RemoteServiceError>> {
    if (group.existence !== Existence.Unknown) {
      return ok(group.existence === Existence.Exists);
    }

    const count = await callRemote(() => this.remote.listGroupsByPrefix(group.name));
    if (!count.ok) return count;

    group.settle(count.value > 0);
    return ok(count.value > 0);
  }

  async streamExists(
    group: LogGroup,
    stream: LogStream,
  ): Promise<Result<boolean, RemoteServiceError | GroupNotFoundError>> {
    assertStreamOf(group, stream);

    if (stream.existence !== Existence.Unknown) {
      return ok(stream.existence === Existence.Exists);
    }

    const groupFound = await this.groupExists(group);
    if (!groupFound.ok) return groupFound;
    if (!groupFound.value) return err(new GroupNotFoundError(group.name));

    const count = await callRemote(() => this.remote.listStreamsByPrefix(group.name, stream.name));
    if (!count.ok) return count;

    stream.settle(count.value > 0);
    return ok(count.value > 0);
  }

  /** Records a successful create without another round-trip. */
  markCreated(destination: LogGroup | LogStream): void {
    destination.markCreated();
  }
}

export function assertStreamOf(group: LogGroup, stream: LogStream): void {
  if (stream.group !== group) {
    throw new TypeError(`Stream '${stream.name}' does not belong to group '${group.name}'`);
  }
}
