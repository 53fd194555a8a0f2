/**
 * Line Assembler
 *
 * Turns arbitrary byte chunks from one file into complete lines:
 * - Single line-feed delimiter, stripped from emitted lines
 * - Partial trailing fragments kept until their delimiter arrives
 * - Bytes are decoded only once a line is complete, so multi-byte
 *   characters split across chunks survive
 * - Bounded buffer with LineOverflowError on overflow
 */

import { LineOverflowError } from './errors.js';

/** Line feed */
export const LINE_DELIMITER = 0x0a;

/** 1 MiB */
export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

const EMPTY = Buffer.alloc(0);

/**
 * Line assembler configuration
 */
export interface LineAssemblerConfig {
  /** Largest unterminated fragment kept between chunks (bytes) */
  maxBufferedBytes?: number;
  /** Encoding used to decode completed lines */
  encoding?: BufferEncoding;
}

/**
 * Byte accounting for one assembler
 */
export interface LineAssemblerStats {
  /** Bytes passed to feed() and consumed */
  bytesFed: number;
  /** Bytes emitted as lines, delimiters included */
  bytesEmitted: number;
  /** Bytes currently held as an unterminated fragment */
  bufferedBytes: number;
  /** Bytes dropped because of overflow */
  bytesDiscarded: number;
  /** Lines emitted */
  linesEmitted: number;
}

export class LineAssembler {
  private readonly maxBufferedBytes: number;
  private readonly encoding: BufferEncoding;
  private buffer: Buffer = EMPTY;
  private bytesFed = 0;
  private bytesEmitted = 0;
  private bytesDiscarded = 0;
  private linesEmitted = 0;

  constructor(config: LineAssemblerConfig = {}) {
    this.maxBufferedBytes = config.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.encoding = config.encoding ?? 'utf8';
  }

  /**
   * Feed a chunk and iterate the lines it completes.
   *
   * Work happens as the returned iterator is consumed; callers must drain it.
   * If the remaining fragment is larger than maxBufferedBytes once every
   * complete line has been yielded, the fragment is discarded and the
   * iterator throws LineOverflowError.
   */
  *feed(chunk: Uint8Array): Generator<string, void, undefined> {
    this.bytesFed += chunk.length;

    const data = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : Buffer.from(chunk);
    let start = 0;
    let index = data.indexOf(LINE_DELIMITER, start);

    while (index !== -1) {
      const line = data.toString(this.encoding, start, index);
      this.bytesEmitted += index - start + 1;
      this.linesEmitted++;
      start = index + 1;

      // Keep state consistent if the consumer stops iterating early
      this.buffer = data.subarray(start);
      yield line;

      index = data.indexOf(LINE_DELIMITER, start);
    }

    this.buffer = start === data.length ? EMPTY : data.subarray(start);

    if (this.buffer.length > this.maxBufferedBytes) {
      const discarded = this.buffer.length;
      this.buffer = EMPTY;
      this.bytesDiscarded += discarded;
      throw new LineOverflowError(discarded, this.maxBufferedBytes);
    }
  }

  /**
   * Bytes currently waiting for a delimiter
   */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  getStats(): LineAssemblerStats {
    return {
      bytesFed: this.bytesFed,
      bytesEmitted: this.bytesEmitted,
      bufferedBytes: this.buffer.length,
      bytesDiscarded: this.bytesDiscarded,
      linesEmitted: this.linesEmitted,
    };
  }
}
