/**
 * Core domain types for a shipped log event.
 *
 * An event is the unit appended to a log stream. These types carry
 * no SDK dependencies; adapters translate them to and from the wire.
 */

/**
 * Canonical LogEvent entity.
 *
 * `ingestionTime` is only known once the remote service has stored the
 * event, so write-side construction leaves it out entirely.
 */
export interface LogEvent {
  readonly timestamp: number; // epoch ms
  readonly message: string;
  readonly ingestionTime?: number; // epoch ms
}

/** Shape exchanged with the remote append/read calls. */
export interface WireEvent {
  timestamp: number;
  message: string;
  ingestionTime?: number;
}

function assertEpochMillis(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${field} must be a non-negative integer, got ${value}`);
  }
}

/** Builds a frozen LogEvent. Throws RangeError on a negative or fractional time. */
export function createLogEvent(input: {
  timestamp: number;
  message: string;
  ingestionTime?: number | undefined;
}): LogEvent {
  assertEpochMillis('timestamp', input.timestamp);

  if (input.ingestionTime === undefined) {
    return Object.freeze({ timestamp: input.timestamp, message: input.message });
  }

  assertEpochMillis('ingestionTime', input.ingestionTime);
  return Object.freeze({
    timestamp: input.timestamp,
    message: input.message,
    ingestionTime: input.ingestionTime,
  });
}

export function toWireEvent(event: LogEvent): WireEvent {
  const wire: WireEvent = { timestamp: event.timestamp, message: event.message };
  if (event.ingestionTime !== undefined) {
    wire.ingestionTime = event.ingestionTime;
  }
  return wire;
}

/** A negative ingestion time is the legacy "unset" marker and is dropped. */
export function fromWireEvent(wire: WireEvent): LogEvent {
  const ingestionTime =
    wire.ingestionTime !== undefined && wire.ingestionTime >= 0 ? wire.ingestionTime : undefined;
  return createLogEvent({ timestamp: wire.timestamp, message: wire.message, ingestionTime });
}

/** Human-readable one-line trace: `[time][D - ingested]: message`. */
export function formatEvent(event: LogEvent): string {
  const timeInfo = `[${new Date(event.timestamp).toISOString()}]`;
  const ingested =
    event.ingestionTime !== undefined
      ? `[D - ${new Date(event.ingestionTime).toISOString()}]`
      : '';
  return `${timeInfo}${ingested}: ${event.message}`;
}
