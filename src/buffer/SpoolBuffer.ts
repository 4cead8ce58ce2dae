export const INITIAL_SPOOL_CAPACITY = 16384 as const;

/**
 * A growable byte buffer. Holds written sample data until the header can be
 * finalized, and backs `MemoryStream`.
 */
export class SpoolBuffer {
  private buffer: Uint8Array;
  private _length = 0;

  /**
   * @param capacity Initial capacity in bytes. Grows by doubling as needed.
   */
  constructor(capacity: number = INITIAL_SPOOL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Capacity must be a positive integer');
    }
    this.buffer = new Uint8Array(capacity);
  }

  /** Number of bytes held. */
  get length(): number {
    return this._length;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Appends data at the end.
   * @returns The new length.
   */
  append(data: Uint8Array): number {
    this.writeAt(this._length, data);
    return this._length;
  }

  /**
   * Writes data at `position`, growing the buffer if needed. A gap between the
   * current end and `position` is zero-filled.
   */
  writeAt(position: number, data: Uint8Array): void {
    if (!Number.isInteger(position) || position < 0) throw new RangeError('Position must be non-negative');
    const end = position + data.length;
    this.ensureCapacity(end);
    this.buffer.set(data, position);
    if (end > this._length) this._length = end;
  }

  /**
   * Copies up to `length` bytes starting at `position`. Returns fewer bytes near the end.
   */
  read(position: number, length: number): Uint8Array {
    if (length < 0) throw new RangeError('Length must be non-negative');
    const start = Math.min(position, this._length);
    return this.buffer.slice(start, Math.min(start + length, this._length));
  }

  /** A view of the held bytes; invalidated by the next write that grows the buffer. */
  view(): Uint8Array {
    return this.buffer.subarray(0, this._length);
  }

  /** A copy of the held bytes. */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this._length);
  }

  /**
   * Sets the length to `length`, dropping bytes past it or zero-filling up to it.
   */
  truncate(length: number): void {
    if (!Number.isInteger(length) || length < 0) throw new RangeError('Length must be non-negative');
    if (length > this._length) {
      this.ensureCapacity(length);
      this.buffer.fill(0, this._length, length);
    }
    this._length = length;
  }

  clear(): void {
    this._length = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this._length));
    this.buffer = grown;
  }
}
