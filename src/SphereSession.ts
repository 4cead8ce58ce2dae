import type { Logger } from 'pino';
import type {
  HeaderField,
  HeaderFieldMap,
  OpenMode,
  SampleWidth,
  SessionOptions,
  SphereParams,
  SphereParamsInput,
} from './types';
import { PREAMBLE_SIZE, RATE_REQUIRED_CODINGS } from './constants';
import {
  InvalidParameterError,
  MalformedHeaderError,
  ModeError,
  SessionClosedError,
  StreamInUseError,
  TruncatedDataError,
} from './errors';
import { SessionState, SessionStateMachine } from './core/StateMachine';
import { parseSphereHeader, readHeaderSize } from './parseSphereHeader';
import { serializeSphereHeader } from './serializeSphereHeader';
import { decodePCM } from './decoders/pcm/decodePCM';
import { encodePCM } from './encoders/pcm/encodePCM';
import { assertSupportedWidth, defaultByteFormat, resolveByteOrder } from './utils/byte-format';
import {
  fieldsToRecord,
  resolveSessionOptions,
  toHeaderField,
  validateSphereParams,
  type ResolvedSessionOptions,
} from './format-validation';
import { type ByteStream, claimStream, isByteStream, releaseStream } from './io/ByteStream';
import { FileStream } from './io/FileStream';
import { SpoolBuffer } from './buffer/SpoolBuffer';
import { logger } from './logger';

/** A file path, or a stream the caller keeps ownership of. */
export type SessionTarget = string | ByteStream;

/**
 * Maps an open mode onto read (`false`) or write (`true`).
 * @throws {ModeError} for anything but `r`, `rb`, `w` and `wb`.
 */
export function isWriteMode(mode: string): boolean {
  if (mode === 'r' || mode === 'rb') return false;
  if (mode === 'w' || mode === 'wb') return true;
  throw new ModeError(`Mode must be 'r', 'rb', 'w' or 'wb', got '${mode}'`);
}

function isFieldList(params: SphereParamsInput | readonly HeaderField[]): params is readonly HeaderField[] {
  return Array.isArray(params);
}

/**
 * A read or write session on one SPHERE file.
 *
 * Read mode parses the header on `open` and serves frames from the sample
 * region. Write mode collects parameters and frames; the header goes out
 * together with the data on `close`, once the final `sample_count` is known.
 */
export class SphereSession {
  private readonly _stateMachine = new SessionStateMachine();
  private readonly _options: ResolvedSessionOptions;
  private readonly _log: Logger;
  private readonly _spool = new SpoolBuffer();
  private _stream: ByteStream | null = null;
  private _ownsStream = false;
  private _fields: HeaderFieldMap = new Map();
  private _headerSize: number;
  private _warnings: string[] = [];

  // read mode
  private _frameSize = 0;
  private _nframes = 0;
  private _position = 0;

  // write mode
  private _framesWritten = 0;

  constructor(options: SessionOptions = {}) {
    this._options = resolveSessionOptions(options);
    this._headerSize = this._options.headerSize;
    this._log = (this._options.logger ?? logger).child({ component: 'SphereSession' });
  }

  public get state(): SessionState {
    return this._stateMachine.state;
  }

  /** Header/data discrepancies noticed so far. */
  public get warnings(): readonly string[] {
    return [...this._warnings];
  }

  /** Size of the header block read from the file, or the one that will be written. */
  public get headerSize(): number {
    return this._headerSize;
  }

  /**
   * Opens the session on a path or stream. A session opens exactly once.
   * @throws {SessionClosedError} if this session was opened before.
   * @throws {ModeError} for an unknown mode.
   */
  public open(target: SessionTarget, mode: OpenMode = 'r'): this {
    this.assertUnopened();
    const writing = isWriteMode(mode);

    let stream: ByteStream;
    if (typeof target === 'string') {
      stream = FileStream.open(target, writing ? 'w' : 'r');
      this._ownsStream = true;
    } else if (isByteStream(target)) {
      stream = target;
    } else {
      throw new InvalidParameterError('Expected a file path or a ByteStream');
    }

    if (!claimStream(stream)) {
      if (this._ownsStream) stream.close();
      throw new StreamInUseError('The stream is already owned by another open session');
    }
    this._stream = stream;

    try {
      if (writing) {
        this._fields = new Map();
      } else {
        this.initRead(stream);
      }
    } catch (err) {
      this.release();
      this._stateMachine.transition(SessionState.CLOSED);
      throw err;
    }

    this._stateMachine.transition(writing ? SessionState.WRITING : SessionState.READING);
    this._log.debug({ mode, headerSize: this._headerSize }, 'session opened');
    return this;
  }

  /**
   * The header as application-facing parameters, one property per field.
   *
   * In read mode `sample_count` is the number of frames that can actually be
   * read. In write mode it is the number of frames written so far, or the
   * declared value before the first write.
   */
  public getparams(): SphereParams {
    this.assertOpen();
    if (this._stateMachine.state === SessionState.WRITING) {
      this.assertWriteParams();
      return this.buildParams(this.pendingSampleCount());
    }
    return this.buildParams(this._nframes);
  }

  /** A copy of the header fields in header order. */
  public getheader(): HeaderField[] {
    this.assertOpen();
    return Array.from(this._fields.values(), (field) => ({ ...field }));
  }

  /**
   * Merges fields into the pending header. Only allowed before frames are written.
   *
   * Plain numbers lose the integer/real distinction of the file they came from.
   * To copy a header exactly, pass the typed fields of `getheader()` instead.
   * @throws {InvalidParameterError} if the merged set breaks a constraint; nothing is applied then.
   */
  public setparams(params: SphereParamsInput | readonly HeaderField[]): void {
    this.assertMode(SessionState.WRITING, 'setparams');
    if (this._spool.length > 0) {
      throw new InvalidParameterError('Cannot change parameters after starting to write');
    }

    const entries = isFieldList(params)
      ? params.map((field): [string, HeaderField] => [field.name, field])
      : Object.entries(params);
    const next: HeaderFieldMap = new Map(this._fields);
    for (const [name, input] of entries) {
      if (input === undefined) continue;
      next.set(name, toHeaderField(name, input, next.get(name)));
    }
    validateSphereParams(next);
    this._fields = next;
    this._log.debug({ fields: [...next.keys()] }, 'parameters set');
  }

  /**
   * Reads at most `nframes` frames from the cursor, as stored in the file.
   * Near the end fewer frames come back; at the end, none.
   */
  public readframes(nframes: number): Uint8Array {
    this.assertMode(SessionState.READING, 'readframes');
    if (!Number.isInteger(nframes) || nframes < 0) {
      throw new InvalidParameterError(`Frame count must be a non-negative integer, got ${nframes}`);
    }

    const count = Math.min(nframes, this._nframes - this._position);
    if (count <= 0) return new Uint8Array(0);

    const stream = this.requireStream();
    const length = count * this._frameSize;
    stream.seek(this._headerSize + this._position * this._frameSize);
    const data = stream.read(length);
    if (data.length < length) throw new TruncatedDataError(length, data.length);

    this._position += count;
    return data;
  }

  /**
   * Reads at most `nframes` frames and decodes them into signed samples, interleaved by frame.
   */
  public readsamples(nframes: number): Int32Array {
    const data = this.readframes(nframes);
    const width = this.sampleWidth();
    const channels = this.requireInteger('channel_count');
    return decodePCM(data, width, this.byteFormat(width), channels, data.length / this._frameSize);
  }

  /**
   * Appends frames, already laid out in the header's byte format.
   * @throws {InvalidParameterError} if the data is not a whole number of frames or required parameters are missing.
   */
  public writeframes(data: Uint8Array): void {
    this.assertMode(SessionState.WRITING, 'writeframes');
    this.assertWriteParams();

    const frameSize = this.sampleWidth() * this.requireInteger('channel_count');
    if (data.length % frameSize !== 0) {
      throw new InvalidParameterError(`${data.length} bytes is not a whole number of ${frameSize}-byte frames`);
    }
    if (data.length === 0) return;

    this._spool.append(data);
    this._framesWritten += data.length / frameSize;
    this._fields.set('sample_count', { name: 'sample_count', type: 'integer', value: this._framesWritten });
  }

  /**
   * Encodes interleaved signed samples in the header's byte format and appends them.
   */
  public writesamples(samples: ArrayLike<number>): void {
    this.assertMode(SessionState.WRITING, 'writesamples');
    this.assertWriteParams();
    const width = this.sampleWidth();
    this.writeframes(encodePCM(samples, width, this.byteFormat(width), this.requireInteger('channel_count')));
  }

  /** Read mode: the frame cursor. Write mode: frames written so far. */
  public tell(): number {
    this.assertOpen();
    return this._stateMachine.state === SessionState.WRITING ? this._framesWritten : this._position;
  }

  public setpos(pos: number): void {
    this.assertMode(SessionState.READING, 'setpos');
    if (!Number.isInteger(pos) || pos < 0 || pos > this._nframes) {
      throw new InvalidParameterError(`Position ${pos} not in range [0, ${this._nframes}]`);
    }
    this._position = pos;
  }

  public rewind(): void {
    this.assertMode(SessionState.READING, 'rewind');
    this._position = 0;
  }

  /**
   * Finishes the session. In write mode the header and the collected frames are
   * written first. The stream is released even when that fails. Closing twice
   * does nothing.
   */
  public close(): void {
    const state = this._stateMachine.state;
    if (state === SessionState.CLOSED) return;

    try {
      if (state === SessionState.WRITING) this.finalize();
    } finally {
      this.release();
      this._stateMachine.transition(SessionState.CLOSED);
      this._log.debug('session closed');
    }
  }

  private initRead(stream: ByteStream): void {
    stream.seek(0);
    const headerSize = readHeaderSize(stream.read(PREAMBLE_SIZE));
    stream.seek(0);
    const header = parseSphereHeader(stream.read(headerSize));

    this._headerSize = header.headerSize;
    this._fields = header.fields;
    for (const warning of header.warnings) this.warn(warning);

    const channels = this.requireInteger('channel_count');
    if (channels < 1) throw new MalformedHeaderError(`channel_count must be at least 1, got ${channels}`);
    const width = this.sampleWidth();
    try {
      resolveByteOrder(this.byteFormat(width), width);
    } catch (err) {
      if (err instanceof InvalidParameterError) throw new MalformedHeaderError(err.message);
      throw err;
    }

    this._frameSize = channels * width;
    const available = Math.max(0, stream.size() - headerSize);
    const availableFrames = Math.floor(available / this._frameSize);
    const declared = this._fields.get('sample_count');

    if (declared === undefined) {
      this.warn(`Header has no sample_count; using the ${availableFrames} frames present`);
      this._nframes = availableFrames;
      return;
    }
    if (declared.type !== 'integer' || declared.value < 0) {
      throw new MalformedHeaderError(`sample_count must be a non-negative integer, got ${declared.value}`);
    }

    if (declared.value > availableFrames) {
      if (this._options.sampleCountPolicy === 'strict') {
        throw new TruncatedDataError(declared.value * this._frameSize, available, 'sample region');
      }
      this.warn(
        `Header declares ${declared.value} frames but only ${availableFrames} are present; reading ${availableFrames}`
      );
      this._nframes = availableFrames;
      return;
    }

    if (declared.value < availableFrames) {
      this._log.debug({ declared: declared.value, availableFrames }, 'ignoring data past sample_count');
    }
    this._nframes = declared.value;
  }

  private finalize(): void {
    this.assertWriteParams();
    const fields: HeaderFieldMap = new Map(this._fields);
    fields.set('sample_count', { name: 'sample_count', type: 'integer', value: this._framesWritten });

    // Build the whole header before touching the stream.
    const header = serializeSphereHeader(fields.values(), this._headerSize);
    const stream = this.requireStream();
    stream.seek(0);
    stream.write(header);
    stream.write(this._spool.view());
    stream.truncate(header.length + this._spool.length);
    this._fields = fields;
    this._log.debug({ frames: this._framesWritten, bytes: header.length + this._spool.length }, 'file written');
  }

  private release(): void {
    const stream = this._stream;
    this._stream = null;
    this._spool.clear();
    if (!stream) return;
    releaseStream(stream);
    if (this._ownsStream) stream.close();
  }

  private buildParams(sampleCount: number): SphereParams {
    return {
      ...fieldsToRecord(this._fields.values()),
      channel_count: this.requireInteger('channel_count'),
      sample_n_bytes: this.requireInteger('sample_n_bytes'),
      sample_count: sampleCount,
    };
  }

  private pendingSampleCount(): number {
    if (this._spool.length > 0) return this._framesWritten;
    const declared = this._fields.get('sample_count');
    return declared?.type === 'integer' ? declared.value : 0;
  }

  private assertWriteParams(): void {
    const missing = ['channel_count', 'sample_n_bytes'].filter((name) => !this._fields.has(name));
    const coding = this._fields.get('sample_coding');
    const codingName = coding?.type === 'string' ? coding.value : 'pcm';
    if (RATE_REQUIRED_CODINGS.has(codingName) && !this._fields.has('sample_rate')) missing.push('sample_rate');
    if (missing.length > 0) {
      throw new InvalidParameterError(`Not all parameters set: ${missing.join(', ')} required`);
    }
  }

  private requireInteger(name: string): number {
    const field = this._fields.get(name);
    if (field?.type !== 'integer') {
      const problem = `Header field "${name}" is missing or not an integer`;
      if (this._stateMachine.state === SessionState.WRITING) throw new InvalidParameterError(problem);
      throw new MalformedHeaderError(problem);
    }
    return field.value;
  }

  private sampleWidth(): SampleWidth {
    const width = this.requireInteger('sample_n_bytes');
    assertSupportedWidth(width);
    return width;
  }

  private byteFormat(width: SampleWidth): string {
    const field = this._fields.get('sample_byte_format');
    return field?.type === 'string' ? field.value : defaultByteFormat(width);
  }

  private requireStream(): ByteStream {
    if (!this._stream) throw new SessionClosedError('Session has no open stream');
    return this._stream;
  }

  private warn(message: string): void {
    this._warnings.push(message);
    this._log.warn(message);
  }

  private assertUnopened(): void {
    const state = this._stateMachine.state;
    if (state === SessionState.CLOSED) throw new SessionClosedError('Session is closed and cannot be reopened');
    if (state !== SessionState.UNOPENED) throw new SessionClosedError('Session is already open');
  }

  /**
   * @throws {SessionClosedError} unless the session is open for reading or writing.
   */
  public assertOpen(): void {
    if (this._stateMachine.isOpen) return;
    if (this._stateMachine.state === SessionState.UNOPENED) throw new SessionClosedError('Session is not open');
    throw new SessionClosedError('Session is closed');
  }

  private assertMode(expected: SessionState, operation: string): void {
    this.assertOpen();
    if (this._stateMachine.state !== expected) {
      const mode = this._stateMachine.state === SessionState.READING ? 'read' : 'write';
      throw new ModeError(`${operation} is not available in ${mode} mode`);
    }
  }
}
