export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  setLogContextFields,
  type LogContext
} from './context';
export {
  createNoopLogger,
  createStructuredLogger,
  LogEventInputSchema,
  LogLevelSchema,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog} from './redaction';
