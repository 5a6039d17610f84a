/**
 * Structured JSON logging with OpenTelemetry correlation
 *
 * NDJSON log lines with RFC 5424 levels, written to stderr because stdout
 * carries the protocol. Entries can also be forwarded to the connected
 * client as `notifications/message`.
 */

import { trace, context } from '@opentelemetry/api';
import { LOG_LEVEL_PRIORITY, type LogLevel, LogLevelSchema } from '../logging/handler.js';

// =============================================================================
// Types
// =============================================================================

export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** RFC 5424 level name */
  level: string;
  message: string;
  /** Logger name/component */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

/**
 * Receives every entry that passes the level filter, e.g. to forward it
 * to the MCP client
 */
export type LogSink = (level: LogLevel, message: string, data: unknown, logger: string | undefined) => void;

export interface StructuredLoggerOptions {
  /** Logger name/component identifier */
  name?: string;
  /** Minimum log level (default: from MCP_LOG_LEVEL env or 'info') */
  minLevel?: LogLevel;
  /** Output function (default: a line on stderr) */
  output?: (json: string) => void;
  sink?: LogSink;
}

// =============================================================================
// Helper Functions
// =============================================================================

function getDefaultLogLevel(): LogLevel {
  const result = LogLevelSchema.safeParse(process.env['MCP_LOG_LEVEL']);
  return result.success ? result.data : 'info';
}

function writeToStderr(json: string): void {
  process.stderr.write(`${json}\n`);
}

const INVALID_TRACE_ID = '00000000000000000000000000000000';
const INVALID_SPAN_ID = '0000000000000000';

/**
 * Trace context of the active OpenTelemetry span, if any
 */
function getTraceContext(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const { traceId, spanId } = span.spanContext();
  if (traceId === INVALID_TRACE_ID || spanId === INVALID_SPAN_ID) {
    return {};
  }

  return { traceId, spanId };
}

// =============================================================================
// StructuredLogger Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'dice' });
 *
 * logger.info('Server started', { tools: 4 });
 * // stderr: {"timestamp":"...","level":"info","message":"Server started","logger":"dice","data":{"tools":4}}
 *
 * const toolLogger = logger.child('tools');
 * // toolLogger.getName() === 'dice.tools'
 * ```
 */
export class StructuredLogger {
  private readonly name?: string;
  private minLevel: LogLevel;
  private readonly output: (json: string) => void;
  private readonly sink?: LogSink;

  constructor(options: StructuredLoggerOptions = {}) {
    if (options.name !== undefined) {
      this.name = options.name;
    }
    if (options.sink !== undefined) {
      this.sink = options.sink;
    }
    this.minLevel = options.minLevel ?? getDefaultLogLevel();
    this.output = options.output ?? writeToStderr;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getName(): string | undefined {
    return this.name;
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.name !== undefined) {
      entry.logger = this.name;
    }

    const traceContext = getTraceContext();
    if (traceContext.traceId) {
      entry.traceId = traceContext.traceId;
    }
    if (traceContext.spanId) {
      entry.spanId = traceContext.spanId;
    }

    if (data !== undefined) {
      entry.data = data;
    }

    this.output(JSON.stringify(entry));
    this.sink?.(level, message, data, this.name);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  /**
   * Child logger named `<parent>.<childName>`, sharing level, output and sink
   * as they are at creation time.
   */
  child(childName: string): StructuredLogger {
    const options: StructuredLoggerOptions = {
      name: this.name ? `${this.name}.${childName}` : childName,
      minLevel: this.minLevel,
      output: this.output,
    };
    if (this.sink !== undefined) {
      options.sink = this.sink;
    }
    return new StructuredLogger(options);
  }
}

export { type LogLevel } from '../logging/handler.js';
