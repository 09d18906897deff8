import type { Destinations, LogEvent, Result, ShipperError } from '../domain/index.js';
import type { LogShipper } from './log-shipper.js';

/**
 * Use case: read a stream back. Checks existence through the shipper's
 * cache; does not create anything.
 */
export async function fetchEvents(
  shipper: LogShipper,
  destinations: Destinations,
): Promise<Result<LogEvent[], ShipperError>> {
  return shipper.getEvents(destinations.group, destinations.stream);
}
