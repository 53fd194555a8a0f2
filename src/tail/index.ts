/**
 * Tail Module
 *
 * Exports the tail reader, line assembly and per-file sessions.
 */

export {
  LineAssembler,
  LINE_DELIMITER,
  DEFAULT_MAX_BUFFERED_BYTES,
  type LineAssemblerConfig,
  type LineAssemblerStats,
} from './line-assembler.js';
export {
  FileTailReader,
  createFileTailOpener,
  type OpenTail,
  type TailCallbacks,
  type TailHandle,
  type TailReaderOptions,
} from './tail-reader.js';
export {
  TailSession,
  SessionState,
  type LineHandler,
  type SessionErrorHandler,
  type SessionStatus,
  type TailSessionConfig,
} from './tail-session.js';
export {
  AcquisitionError,
  AcquisitionErrorKind,
  LineOverflowError,
  toAcquisitionError,
} from './errors.js';
