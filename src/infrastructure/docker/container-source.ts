import { Readable } from 'node:stream';
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type Docker from 'dockerode';
import type { Logger } from 'pino';
import { ContainerError } from '../../domain/index.js';
import type { LogLineSource, RawLogLine } from '../../application/index.js';

/** Environment every shipped container runs with; keeps interpreters from buffering stdout. */
export const CONTAINER_ENV = ['PYTHONUNBUFFERED=1'];

export interface ContainerSpec {
  image: string;
  command: string;
  name?: string | undefined;
}

/**
 * LogLineSource backed by a Docker container.
 *
 * `start()` checks the image is present locally, creates and starts the
 * container, and attaches to its combined output with Docker's own
 * timestamps prepended to every line. The container runs with a TTY so
 * the stream is raw text rather than multiplexed frames.
 *
 * `close()` detaches from the output; the container itself keeps running.
 */
export class DockerContainerSource implements LogLineSource {
  private readonly docker: Docker;
  private readonly spec: ContainerSpec;
  private readonly log: Logger;
  private readonly now: () => number;
  private output: Readable | null = null;
  private reader: Interface | null = null;

  constructor(docker: Docker, spec: ContainerSpec, log: Logger, now: () => number = Date.now) {
    this.docker = docker;
    this.spec = spec;
    this.log = log;
    this.now = now;
  }

  async start(): Promise<void> {
    if (this.reader) {
      throw new ContainerError('api-error', 'Container already started');
    }
    const { image, command, name } = this.spec;

    try {
      const images = await this.docker.listImages({ filters: { reference: [image] } });
      if (images.length === 0) {
        throw new ContainerError(
          'image-not-found',
          `Image not found on local machine. Please install it using "docker pull ${image}"`,
        );
      }

      const container = await this.docker.createContainer({
        Image: image,
        Cmd: ['/bin/sh', '-c', command],
        Env: CONTAINER_ENV,
        Tty: true,
        name,
      });
      this.log.info({ containerId: container.id, image }, 'Container created');

      await container.start();

      const raw = await container.logs({ follow: true, stdout: true, stderr: true, timestamps: true });
      this.output = new Readable().wrap(raw);
      this.reader = createInterface({ input: this.output, crlfDelay: Infinity });
    } catch (error: unknown) {
      if (error instanceof ContainerError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ContainerError('api-error', message, { cause: error });
    }
  }

  /**
   * Pull-based view of the output: each `next()` waits for one more line,
   * resolves `done` once the output ends, and rejects with a
   * ContainerError if reading fails.
   */
  lines(): AsyncIterable<RawLogLine> {
    const reader = this.reader;
    if (!reader) {
      throw new ContainerError('log-stream', 'Container not started');
    }
    const now = this.now;

    return {
      [Symbol.asyncIterator]: (): AsyncIterator<RawLogLine> => {
        const inner = reader[Symbol.asyncIterator]();
        return {
          next: async (): Promise<IteratorResult<RawLogLine>> => {
            try {
              const result = await inner.next();
              if (result.done) return { done: true, value: undefined };
              return { done: false, value: { text: result.value, receivedAt: now() } };
            } catch (error: unknown) {
              throw new ContainerError('log-stream', 'Reading container output failed', { cause: error });
            }
          },
          return: async (): Promise<IteratorResult<RawLogLine>> => {
            await inner.return?.();
            return { done: true, value: undefined };
          },
        };
      },
    };
  }

  async close(): Promise<void> {
    this.reader?.close();
    this.output?.destroy();
    this.reader = null;
    this.output = null;
  }
}
