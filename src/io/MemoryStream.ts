import type { ByteStream } from './ByteStream';
import { SpoolBuffer } from '../buffer/SpoolBuffer';

/**
 * An in-memory `ByteStream`.
 */
export class MemoryStream implements ByteStream {
  private readonly spool: SpoolBuffer;
  private position = 0;
  private closed = false;

  /**
   * @param initial Bytes the stream starts with (copied). Position starts at 0.
   */
  constructor(initial?: Uint8Array) {
    this.spool = new SpoolBuffer(Math.max(initial?.length ?? 0, 1024));
    if (initial) this.spool.append(initial);
  }

  seek(offset: number): void {
    this.assertOpen();
    if (!Number.isInteger(offset) || offset < 0) throw new RangeError(`Invalid seek offset: ${offset}`);
    this.position = offset;
  }

  tell(): number {
    return this.position;
  }

  read(length: number): Uint8Array {
    this.assertOpen();
    const data = this.spool.read(this.position, length);
    this.position += data.length;
    return data;
  }

  write(data: Uint8Array): void {
    this.assertOpen();
    this.spool.writeAt(this.position, data);
    this.position += data.length;
  }

  truncate(length: number): void {
    this.assertOpen();
    this.spool.truncate(length);
  }

  size(): number {
    return this.spool.length;
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** A copy of the stream contents. Still available after `close`. */
  toUint8Array(): Uint8Array {
    return this.spool.toUint8Array();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('MemoryStream is closed');
  }
}
