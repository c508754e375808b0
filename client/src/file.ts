import fs from 'fs';
import { once } from 'events';
import type { Readable, Writable } from 'stream';
import { logger } from '@genkit-ai/core/logging';
import type { ApiContext } from './api';
import { TransportError } from './errors';
import type { FileRecord } from './schema';

export type DumpTarget =
  | { kind: 'stream'; stream: Writable }
  | { kind: 'path'; path: string };

export const toStream = (stream: Writable): DumpTarget => ({ kind: 'stream', stream });
export const toPath = (path: string): DumpTarget => ({ kind: 'path', path });

/**
 * Descriptor of a file stored on the server. Holds no content;
 * every dump fetches it again.
 */
export class RemoteFile {
  readonly url: string;
  readonly contentUrl: string;
  readonly id: string;
  readonly jobId: string | undefined;
  readonly path: string;
  readonly label: string;
  readonly mediaType: string;

  constructor(private readonly context: ApiContext, record: FileRecord) {
    this.url = context.resolve(record['@url']);
    this.contentUrl = context.resolve(record['@content']);
    this.id = record.id;
    this.jobId = record.jobId ?? undefined;
    this.path = record.path;
    this.label = record.label ?? '';
    this.mediaType = record.mediaType ?? '';
  }

  /**
   * Stream the file content into `target`.
   * A path is created or truncated and always closed afterwards; a stream is
   * written to and left open. Content written before a failure stays in place.
   */
  async dump(target: DumpTarget): Promise<void> {
    const body = await this.context.openStream(this.contentUrl);
    logger.debug(`Writing ${this.id} to ${target.kind === 'path' ? target.path : 'stream'}`);
    switch (target.kind) {
      case 'path': {
        const handle = await fs.promises.open(target.path, 'w').catch((error: unknown) => {
          body.destroy();
          throw error;
        });
        try {
          await this.copy(body, async chunk => {
            await handle.write(chunk);
          });
        } finally {
          await handle.close();
        }
        break;
      }
      case 'stream':
        await this.copy(body, chunk => writeChunk(target.stream, chunk));
        break;
    }
  }

  private async copy(body: Readable, write: (chunk: Buffer) => Promise<void>): Promise<void> {
    try {
      for await (const chunk of body) {
        await write(Buffer.from(chunk));
      }
    } catch (error) {
      // a failed write stops the iteration without marking the body as errored
      if (body.errored) {
        throw new TransportError(
          `Reading ${this.contentUrl} failed: ${body.errored.message}`,
          this.contentUrl,
          error
        );
      }
      throw error;
    }
  }

  toString(): string {
    return this.id;
  }
}

async function writeChunk(destination: Writable, chunk: Buffer): Promise<void> {
  if (destination.destroyed) {
    throw new Error('Output stream was closed before the content was written');
  }
  if (destination.write(chunk)) {
    return;
  }
  // a destroyed stream never drains; settle on whichever event comes first
  const abort = new AbortController();
  try {
    await Promise.race([
      once(destination, 'drain', { signal: abort.signal }),
      once(destination, 'close', { signal: abort.signal }).then(() => {
        throw new Error('Output stream was closed before the content was written');
      }),
    ]);
  } finally {
    abort.abort();
  }
}
