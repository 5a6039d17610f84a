/**
 * stdio transport implementation
 *
 * Newline-delimited JSON (NDJSON) framing over stdin/stdout.
 *
 * Stream usage:
 * - stdin: Server reads client messages
 * - stdout: Server writes responses and notifications
 * - stderr: Log output only; never protocol traffic
 *
 * Message format: UTF-8 encoded JSON, one object per line, no length prefix.
 */

import { EventEmitter } from 'events';
import type {
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcNotification,
  ParseFailure,
} from '../protocol/jsonrpc.js';
import { parseJsonRpc, serializeMessage } from '../protocol/jsonrpc.js';

// =============================================================================
// Types
// =============================================================================

export interface StdioTransportOptions {
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
}

export type MessageHandler = (message: JsonRpcRequest | JsonRpcNotification) => void;
/** Receives lines that are not valid JSON-RPC; the failure carries the reply id, if any */
export type InvalidMessageHandler = (failure: ParseFailure) => void;
export type ErrorHandler = (error: Error) => void;
export type CloseHandler = () => void;
export type EndHandler = () => void;

// =============================================================================
// Constants
// =============================================================================

const NEWLINE = '\n';
const ENCODING = 'utf8' as const;

// =============================================================================
// StdioTransport Class
// =============================================================================

/**
 * Stdio transport for MCP protocol communication.
 *
 * Buffers partial stdin lines, emits one event per complete message and
 * writes each outgoing message as a single line on stdout. Signal handling
 * belongs to the server's ShutdownManager.
 */
export class StdioTransport {
  private readonly stdin: NodeJS.ReadableStream;
  private readonly stdout: NodeJS.WritableStream;

  private buffer: string = '';
  private started: boolean = false;
  private closed: boolean = false;

  private readonly emitter = new EventEmitter();

  // Bound handlers for cleanup
  private readonly boundOnData: (chunk: Buffer | string) => void;
  private readonly boundOnEnd: () => void;
  private readonly boundOnError: (error: Error) => void;

  constructor(options?: StdioTransportOptions) {
    this.stdin = options?.stdin ?? process.stdin;
    this.stdout = options?.stdout ?? process.stdout;

    this.boundOnData = this.handleData.bind(this);
    this.boundOnEnd = this.handleEnd.bind(this);
    this.boundOnError = this.handleError.bind(this);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Begin reading from stdin.
   */
  start(): void {
    if (this.started) {
      return;
    }

    if (this.closed) {
      throw new Error('Cannot start a closed transport');
    }

    this.started = true;

    if ('setEncoding' in this.stdin && typeof this.stdin.setEncoding === 'function') {
      this.stdin.setEncoding(ENCODING);
    }

    this.stdin.on('data', this.boundOnData);
    this.stdin.on('end', this.boundOnEnd);
    this.stdin.on('error', this.boundOnError);
  }

  /**
   * Write a JSON-RPC message to stdout as one line.
   *
   * @throws Error if transport is closed
   */
  send(message: JsonRpcMessage): void {
    if (this.closed) {
      throw new Error('Cannot send on a closed transport');
    }

    this.stdout.write(serializeMessage(message) + NEWLINE, ENCODING);
  }

  /**
   * Stop reading and emit `close`. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    this.stdin.removeListener('data', this.boundOnData);
    this.stdin.removeListener('end', this.boundOnEnd);
    this.stdin.removeListener('error', this.boundOnError);

    this.emitter.emit('close');
  }

  isClosed(): boolean {
    return this.closed;
  }

  isStarted(): boolean {
    return this.started;
  }

  // ===========================================================================
  // Event Registration
  // ===========================================================================

  onMessage(handler: MessageHandler): void {
    this.emitter.on('message', handler);
  }

  offMessage(handler: MessageHandler): void {
    this.emitter.off('message', handler);
  }

  onInvalidMessage(handler: InvalidMessageHandler): void {
    this.emitter.on('invalid', handler);
  }

  offInvalidMessage(handler: InvalidMessageHandler): void {
    this.emitter.off('invalid', handler);
  }

  /**
   * Stream errors from stdin. Without a listener they are dropped, since
   * an unhandled `error` event would crash the process.
   */
  onError(handler: ErrorHandler): void {
    this.emitter.on('transportError', handler);
  }

  offError(handler: ErrorHandler): void {
    this.emitter.off('transportError', handler);
  }

  /**
   * stdin reached its end. Sending stays possible until `close()`, so
   * replies to requests still in flight can go out.
   */
  onEnd(handler: EndHandler): void {
    this.emitter.on('end', handler);
  }

  offEnd(handler: EndHandler): void {
    this.emitter.off('end', handler);
  }

  onClose(handler: CloseHandler): void {
    this.emitter.on('close', handler);
  }

  offClose(handler: CloseHandler): void {
    this.emitter.off('close', handler);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private handleData(chunk: Buffer | string): void {
    const data = typeof chunk === 'string' ? chunk : chunk.toString(ENCODING);
    this.buffer += data;
    this.processBuffer();
  }

  private processBuffer(): void {
    let newlineIndex: number;

    while ((newlineIndex = this.buffer.indexOf(NEWLINE)) !== -1) {
      const line = this.buffer.substring(0, newlineIndex);
      this.buffer = this.buffer.substring(newlineIndex + 1);

      if (line.trim().length === 0) {
        continue;
      }

      this.processLine(line);
    }
  }

  private processLine(line: string): void {
    const result = parseJsonRpc(line);

    if (!result.success) {
      this.emitter.emit('invalid', result);
      return;
    }

    this.emitter.emit('message', result.data);
  }

  private handleEnd(): void {
    // Last line without a trailing newline
    if (this.buffer.trim().length > 0) {
      this.processLine(this.buffer);
    }
    this.buffer = '';

    this.emitter.emit('end');
  }

  private handleError(error: Error): void {
    this.emitter.emit('transportError', error);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createStdioTransport(options?: StdioTransportOptions): StdioTransport {
  return new StdioTransport(options);
}
