import { vi } from 'vitest';
import type { RawLogLine } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Fixed arrival time for lines without their own timestamp. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

/** Async sequence of raw lines, all received at FIXED_NOW unless overridden. */
export async function* linesFrom(texts: readonly string[], receivedAt = FIXED_NOW): AsyncGenerator<RawLogLine> {
  for (const text of texts) {
    yield { text, receivedAt };
  }
}
