/**
 * Import Module - Barrel Export
 */

export {
  parseDelimited,
  readImportFile,
  assertValidDelimiter,
  DEFAULT_DELIMITER,
} from './delimited-reader';
