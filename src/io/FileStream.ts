import { closeSync, fstatSync, ftruncateSync, openSync, readSync, writeSync } from 'node:fs';
import type { ByteStream } from './ByteStream';

/**
 * A `ByteStream` over a file descriptor, using blocking `node:fs` calls.
 */
export class FileStream implements ByteStream {
  private fd: number | null;
  private position = 0;

  private constructor(
    fd: number,
    public readonly path: string
  ) {
    this.fd = fd;
  }

  /**
   * Opens `path` for reading (`r`) or creates/truncates it for writing (`w`).
   */
  static open(path: string, mode: 'r' | 'w'): FileStream {
    return new FileStream(openSync(path, mode), path);
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0) throw new RangeError(`Invalid seek offset: ${offset}`);
    this.descriptor();
    this.position = offset;
  }

  tell(): number {
    return this.position;
  }

  read(length: number): Uint8Array {
    const fd = this.descriptor();
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = readSync(fd, out, filled, length - filled, this.position + filled);
      if (n === 0) break;
      filled += n;
    }
    this.position += filled;
    return filled === length ? out : out.subarray(0, filled);
  }

  write(data: Uint8Array): void {
    const fd = this.descriptor();
    let written = 0;
    while (written < data.length) {
      written += writeSync(fd, data, written, data.length - written, this.position + written);
    }
    this.position += written;
  }

  truncate(length: number): void {
    ftruncateSync(this.descriptor(), length);
  }

  size(): number {
    return fstatSync(this.descriptor()).size;
  }

  /** Closes the descriptor. Calling it again does nothing. */
  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  private descriptor(): number {
    if (this.fd === null) throw new Error(`FileStream for "${this.path}" is closed`);
    return this.fd;
  }
}
