import type { SphereParams, SphereParamsInput, WaveParams } from './types';
import { COMPNAME_NONE, COMPTYPE_NONE } from './constants';
import { InvalidParameterError } from './errors';
import type { SphereSession } from './SphereSession';

/**
 * Presents a session through the accessor names of a conventional PCM
 * waveform reader/writer. Holds no state of its own: every value is computed
 * from the session's current parameters.
 */
export class WaveAdapter {
  constructor(private readonly _session: SphereSession) {}

  /** The session this adapter reads through. */
  public get session(): SphereSession {
    return this._session;
  }

  public getnchannels(): number {
    return this._session.getparams().channel_count;
  }

  public getsampwidth(): number {
    return this._session.getparams().sample_n_bytes;
  }

  public getframerate(): number {
    const rate = this._session.getparams().sample_rate;
    return typeof rate === 'number' ? rate : 0;
  }

  public getnframes(): number {
    return this._session.getparams().sample_count;
  }

  public getcomptype(): string {
    this._session.assertOpen();
    return COMPTYPE_NONE;
  }

  public getcompname(): string {
    this._session.assertOpen();
    return COMPNAME_NONE;
  }

  public getparams(): WaveParams {
    const params = this._session.getparams();
    const rate = params.sample_rate;
    return {
      nchannels: params.channel_count,
      sampwidth: params.sample_n_bytes,
      framerate: typeof rate === 'number' ? rate : 0,
      nframes: params.sample_count,
      comptype: COMPTYPE_NONE,
      compname: COMPNAME_NONE,
    };
  }

  /** The underlying SPHERE parameters. */
  public getsphparams(): SphereParams {
    return this._session.getparams();
  }

  /**
   * Sets parameters by their waveform names.
   * @throws {InvalidParameterError} for any compression other than `NONE`.
   */
  public setparams(params: Partial<WaveParams>): void {
    if (params.comptype !== undefined && params.comptype !== COMPTYPE_NONE) {
      throw new InvalidParameterError(`Compression type "${params.comptype}" is not supported`);
    }
    const mapped: SphereParamsInput = {
      channel_count: params.nchannels,
      sample_n_bytes: params.sampwidth,
      sample_rate: params.framerate,
      sample_count: params.nframes,
    };
    this._session.setparams(mapped);
  }

  public readframes(nframes: number): Uint8Array {
    return this._session.readframes(nframes);
  }

  public writeframes(data: Uint8Array): void {
    this._session.writeframes(data);
  }

  public tell(): number {
    return this._session.tell();
  }

  public setpos(pos: number): void {
    this._session.setpos(pos);
  }

  public rewind(): void {
    this._session.rewind();
  }

  public close(): void {
    this._session.close();
  }
}
