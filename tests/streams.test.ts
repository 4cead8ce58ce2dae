import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SpoolBuffer } from '../src/buffer/SpoolBuffer';
import { MemoryStream } from '../src/io/MemoryStream';
import { FileStream } from '../src/io/FileStream';
import { claimStream, isByteStream, releaseStream } from '../src/io/ByteStream';

describe('SpoolBuffer', () => {
  it('grows by doubling', () => {
    const spool = new SpoolBuffer(4);
    expect(spool.append(new Uint8Array([1, 2, 3]))).toBe(3);
    expect(spool.capacity).toBe(4);

    spool.append(new Uint8Array([4, 5, 6]));
    expect(spool.length).toBe(6);
    expect(spool.capacity).toBe(8);
    expect(spool.toUint8Array()).toEqual(new Uint8Array([1, 2, 3, 4, 5, 6]));
  });

  it('zero-fills a gap left by writeAt', () => {
    const spool = new SpoolBuffer(4);
    spool.append(new Uint8Array([1, 2]));
    spool.writeAt(5, new Uint8Array([9]));

    expect(spool.length).toBe(6);
    expect(spool.toUint8Array()).toEqual(new Uint8Array([1, 2, 0, 0, 0, 9]));
  });

  it('overwrites in place without growing', () => {
    const spool = new SpoolBuffer(8);
    spool.append(new Uint8Array([1, 2, 3, 4]));
    spool.writeAt(1, new Uint8Array([7, 7]));
    expect(spool.toUint8Array()).toEqual(new Uint8Array([1, 7, 7, 4]));
  });

  it('returns short reads at the end', () => {
    const spool = new SpoolBuffer();
    spool.append(new Uint8Array([1, 2, 3]));
    expect(spool.read(1, 10)).toEqual(new Uint8Array([2, 3]));
    expect(spool.read(5, 2)).toEqual(new Uint8Array(0));
  });

  it('empties on clear', () => {
    const spool = new SpoolBuffer();
    spool.append(new Uint8Array([1, 2, 3]));
    spool.clear();
    expect(spool.length).toBe(0);
    expect(spool.view()).toEqual(new Uint8Array(0));
  });

  it('truncates and zero-fills on the way back up', () => {
    const spool = new SpoolBuffer(4);
    spool.append(new Uint8Array([1, 2, 3, 4]));
    spool.truncate(2);
    expect(spool.toUint8Array()).toEqual(new Uint8Array([1, 2]));

    spool.truncate(5);
    expect(spool.toUint8Array()).toEqual(new Uint8Array([1, 2, 0, 0, 0]));
    expect(() => spool.truncate(-1)).toThrow(RangeError);
  });

  it('rejects a capacity below one', () => {
    expect(() => new SpoolBuffer(0)).toThrow(RangeError);
  });
});

describe('MemoryStream', () => {
  it('reads and writes at the current position', () => {
    const stream = new MemoryStream(new Uint8Array([1, 2, 3, 4]));
    expect(stream.read(2)).toEqual(new Uint8Array([1, 2]));
    expect(stream.tell()).toBe(2);

    stream.write(new Uint8Array([8, 9, 10]));
    expect(stream.tell()).toBe(5);
    expect(stream.size()).toBe(5);

    stream.seek(0);
    expect(stream.read(10)).toEqual(new Uint8Array([1, 2, 8, 9, 10]));
  });

  it('keeps its contents after close', () => {
    const stream = new MemoryStream();
    stream.write(new Uint8Array([5, 6]));
    stream.close();

    expect(stream.isClosed).toBe(true);
    expect(stream.toUint8Array()).toEqual(new Uint8Array([5, 6]));
    expect(() => stream.read(1)).toThrow('MemoryStream is closed');
  });

  it('truncates without moving the position', () => {
    const stream = new MemoryStream(new Uint8Array([1, 2, 3, 4, 5]));
    stream.seek(4);
    stream.truncate(3);

    expect(stream.size()).toBe(3);
    expect(stream.tell()).toBe(4);
    expect(stream.toUint8Array()).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('rejects negative offsets', () => {
    expect(() => new MemoryStream().seek(-1)).toThrow(RangeError);
  });
});

describe('FileStream', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sphere-io-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes at explicit offsets', () => {
    const path = join(dir, 'out.bin');
    const stream = FileStream.open(path, 'w');
    stream.seek(2);
    stream.write(new Uint8Array([3, 4]));
    stream.seek(0);
    stream.write(new Uint8Array([1, 2]));
    expect(stream.size()).toBe(4);
    stream.close();

    expect(new Uint8Array(readFileSync(path))).toEqual(new Uint8Array([1, 2, 3, 4]));
  });

  it('truncates the file', () => {
    const path = join(dir, 'out.bin');
    const stream = FileStream.open(path, 'w');
    stream.write(new Uint8Array([1, 2, 3, 4]));
    stream.truncate(2);
    expect(stream.size()).toBe(2);
    stream.close();

    expect(new Uint8Array(readFileSync(path))).toEqual(new Uint8Array([1, 2]));
  });

  it('reads what is there and no more', () => {
    const path = join(dir, 'in.bin');
    writeFileSync(path, new Uint8Array([1, 2, 3]));

    const stream = FileStream.open(path, 'r');
    expect(stream.size()).toBe(3);
    expect(stream.read(2)).toEqual(new Uint8Array([1, 2]));
    expect(stream.read(5)).toEqual(new Uint8Array([3]));
    expect(stream.read(5)).toEqual(new Uint8Array(0));
    stream.close();
  });

  it('closes once and then refuses to work', () => {
    const path = join(dir, 'in.bin');
    writeFileSync(path, new Uint8Array([1]));

    const stream = FileStream.open(path, 'r');
    stream.close();
    stream.close();
    expect(() => stream.read(1)).toThrow(`FileStream for "${path}" is closed`);
  });
});

describe('stream ownership', () => {
  it('lets one owner claim a stream at a time', () => {
    const stream = new MemoryStream();
    expect(claimStream(stream)).toBe(true);
    expect(claimStream(stream)).toBe(false);
    releaseStream(stream);
    expect(claimStream(stream)).toBe(true);
    releaseStream(stream);
  });

  it('recognises stream-shaped objects', () => {
    expect(isByteStream(new MemoryStream())).toBe(true);
    expect(isByteStream({ read: () => new Uint8Array(0) })).toBe(false);
    expect(isByteStream(null)).toBe(false);
  });
});
