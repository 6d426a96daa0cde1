/**
 * File Sink
 *
 * Writes to `<destination>.part` and renames into place on success.
 * A failed job leaves nothing behind.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { OutputSink, SinkOutcome } from '@tunegrab/core';
import { createLogger, ensureDir, moveFile, removeFile } from '@tunegrab/utils';

const logger = createLogger({ component: 'file-sink' });

export class FileSink implements OutputSink {
  readonly destination: string;
  readonly partPath: string;
  private handle: FileHandle | null = null;
  private position = 0;
  private closed = false;

  constructor(destination: string) {
    this.destination = destination;
    this.partPath = `${destination}.part`;
  }

  get bytesWritten(): number {
    return this.position;
  }

  private async openHandle(): Promise<FileHandle> {
    if (this.closed) {
      throw new Error(`Sink for ${this.destination} is closed`);
    }
    if (!this.handle) {
      await ensureDir(dirname(this.partPath));
      this.handle = await open(this.partPath, 'w');
    }
    return this.handle;
  }

  async write(chunk: Uint8Array): Promise<void> {
    const handle = await this.openHandle();
    let offset = 0;
    while (offset < chunk.length) {
      const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset, this.position);
      offset += bytesWritten;
      this.position += bytesWritten;
    }
  }

  async rewind(): Promise<void> {
    const handle = await this.openHandle();
    await handle.truncate(0);
    this.position = 0;
  }

  async close(outcome: SinkOutcome): Promise<void> {
    if (this.closed) return;

    if (outcome === 'completed') {
      // Zero-byte tracks still produce a file
      await this.openHandle();
    }
    this.closed = true;

    if (this.handle) {
      await this.handle.close();
      this.handle = null;
    }

    if (outcome === 'failed') {
      await removeFile(this.partPath);
      return;
    }

    try {
      await moveFile(this.partPath, this.destination);
    } catch (error) {
      await removeFile(this.partPath);
      throw error;
    }
    logger.debug({ destination: this.destination, bytes: this.position }, 'File written');
  }
}
