/**
 * Log level management and MCP log forwarding
 *
 * RFC 5424 level priorities, the `logging/setLevel` request, and
 * `notifications/message` notifications to the client.
 */

import { z } from 'zod';
import { createNotification, type JsonRpcNotification } from '../protocol/jsonrpc.js';
import { InvalidParamsError } from '../protocol/errors.js';

// =============================================================================
// Constants - RFC 5424 Log Levels
// =============================================================================

/**
 * Lower number = more severe.
 */
export const LOG_LEVEL_PRIORITY = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
} as const;

// =============================================================================
// Schemas
// =============================================================================

export const LogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const SetLevelParamsSchema = z.object({
  level: LogLevelSchema,
});

export type SetLevelParams = z.infer<typeof SetLevelParamsSchema>;

export interface LogMessageParams {
  [key: string]: unknown;
  level: LogLevel;
  message: string;
  logger?: string;
  data?: unknown;
}

// =============================================================================
// Types
// =============================================================================

export type NotificationSender = (notification: JsonRpcNotification) => void;

export interface LoggingHandlerOptions {
  /** Initial minimum level for forwarded messages (default: 'info') */
  minLevel?: LogLevel;
  /** Sends notifications to the client; without one nothing is forwarded */
  notificationSender?: NotificationSender;
}

// =============================================================================
// LoggingHandler Class
// =============================================================================

/**
 * Forwards log messages to the client at or above the level the client
 * asked for with `logging/setLevel`.
 *
 * @example
 * ```typescript
 * const handler = new LoggingHandler({
 *   minLevel: 'info',
 *   notificationSender: (notification) => transport.send(notification),
 * });
 *
 * handler.log('warning', 'Reroll cap reached', { expression: '1d20rr<20' }, 'dice.tools');
 * ```
 */
export class LoggingHandler {
  private currentLevel: LogLevel;
  private notificationSender: NotificationSender | undefined;

  constructor(options: LoggingHandlerOptions = {}) {
    this.currentLevel = options.minLevel ?? 'info';
    this.notificationSender = options.notificationSender;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  /**
   * Handle a logging/setLevel request.
   *
   * @returns Empty result object
   * @throws InvalidParamsError if the level is missing or unknown
   */
  handleSetLevel(params: unknown): Record<string, never> {
    const parseResult = SetLevelParamsSchema.safeParse(params);
    if (!parseResult.success) {
      throw new InvalidParamsError(
        `Invalid params: ${parseResult.error.issues.map((issue) => issue.message).join('; ')}`
      );
    }
    this.setLevel(parseResult.data.level);
    return {};
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.currentLevel];
  }

  /**
   * Send a notifications/message if the level passes and a sender is set.
   */
  log(level: LogLevel, message: string, data?: unknown, logger?: string): void {
    if (!this.shouldLog(level) || !this.notificationSender) {
      return;
    }

    const params: LogMessageParams = { level, message };

    if (logger !== undefined) {
      params.logger = logger;
    }

    if (data !== undefined) {
      params.data = data;
    }

    this.notificationSender(createNotification('notifications/message', params));
  }

  setNotificationSender(sender: NotificationSender): void {
    this.notificationSender = sender;
  }

  info(message: string, data?: unknown, logger?: string): void {
    this.log('info', message, data, logger);
  }

  warning(message: string, data?: unknown, logger?: string): void {
    this.log('warning', message, data, logger);
  }

  error(message: string, data?: unknown, logger?: string): void {
    this.log('error', message, data, logger);
  }
}
