export * from './json/index.js';
export {
  EncodeError,
  JsonError,
  JsonErrorType,
  LexError,
  ParseError,
  TypeMismatchError,
  UnknownFieldError,
  describeJsonError,
  isJsonError,
  type JsonErrorDetails,
} from './utils/errors.js';
export {
  getConfig,
  loadConfig,
  resetConfig,
  type CodecConfig,
  type DuplicateElementPolicy,
  type DuplicateKeyPolicy,
  type LogLevel,
} from './config.js';
