/**
 * Log destinations: a group containing streams.
 *
 * Each destination caches whether it exists remotely. The cache moves
 * out of `unknown` once and is never reset, so a known answer is never
 * re-queried even if the remote changes out-of-band.
 */

export const Existence = {
  Unknown: 'unknown',
  Exists: 'exists',
  NotExists: 'not-exists',
} as const;

export type Existence = (typeof Existence)[keyof typeof Existence];

export class LogGroup {
  private state: Existence = Existence.Unknown;

  constructor(readonly name: string) {}

  get existence(): Existence {
    return this.state;
  }

  /** Records the answer of an existence query. Ignored once known. */
  settle(exists: boolean): void {
    if (this.state !== Existence.Unknown) return;
    this.state = exists ? Existence.Exists : Existence.NotExists;
  }

  /** Called right after a successful create. */
  markCreated(): void {
    this.state = Existence.Exists;
  }
}

/**
 * A stream inside a group. Holds its group by reference only; the
 * session that created both owns them.
 *
 * A stream can only be cached as existing while its group exists.
 */
export class LogStream {
  private state: Existence = Existence.Unknown;

  constructor(
    readonly group: LogGroup,
    readonly name: string,
  ) {}

  get existence(): Existence {
    const groupState = this.group.existence;
    if (groupState !== Existence.Exists) return groupState;
    return this.state;
  }

  settle(exists: boolean): void {
    if (this.group.existence !== Existence.Exists) return;
    if (this.state !== Existence.Unknown) return;
    this.state = exists ? Existence.Exists : Existence.NotExists;
  }

  markCreated(): void {
    if (this.group.existence !== Existence.Exists) return;
    this.state = Existence.Exists;
  }
}

export interface Destinations {
  readonly group: LogGroup;
  readonly stream: LogStream;
}

export function createDestinations(groupName: string, streamName: string): Destinations {
  const group = new LogGroup(groupName);
  return { group, stream: new LogStream(group, streamName) };
}
