/**
 * csv-replay - replay CSV files as sequences of nested documents
 *
 * @module csv-replay
 */

export { Replay, withReplay } from './parsers/replay';
export { buildDocument } from './parsers/documentBuilder';
export { normalizeKeyPath, compileHeaders, formatKeyPath } from './parsers/keyPath';
export { isNumeric, parseScalar } from './parsers/scalar';
export { isCommentLine, isBlankLine, isDataLine, splitCsvLine } from './parsers/csvLine';
export { ReplayError, ReplayOpenError, ReplayHeaderError, ReplayClosedError } from './parsers/errors';
export type { ReplayErrorCode } from './parsers/errors';
export { isEndOfData, isDocumentObject } from './types/document';
export type { DocumentObject, DocumentValue, DocumentScalar } from './types/document';
export { MAX_ARRAY_INDEX } from './types/path';
export type { KeyPath, PathSegment } from './types/path';
export type { ArrayStrategy, ReplayOptions, PlayControl, DocumentCallback } from './types/replay';
