/**
 * Central Message Router
 *
 * Routes JSON-RPC messages to handlers by method name after checking the
 * lifecycle state.
 */

import type { LifecycleManager } from './protocol/lifecycle.js';
import { LifecycleError } from './protocol/lifecycle.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolExecutor } from './tools/executor.js';
import {
  handleToolsList,
  handleToolsCall,
  ToolsListParamsSchema,
  ToolsCallParamsSchema,
} from './tools/executor.js';
import type { LoggingHandler } from './logging/handler.js';
import { McpError, InvalidParamsError, toErrorResponse, fromError } from './protocol/errors.js';
import { StructuredLogger } from './observability/logger.js';
import {
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcNotification,
  type JsonRpcResponse,
  createSuccessResponse,
  createErrorResponse,
  createMethodNotFoundResponse,
  isRequest,
} from './protocol/jsonrpc.js';

// =============================================================================
// Types
// =============================================================================

export interface MessageRouterOptions {
  lifecycleManager: LifecycleManager;
  toolRegistry: ToolRegistry;
  toolExecutor: ToolExecutor;
  loggingHandler: LoggingHandler;
  /** tools/list page size (default: 50) */
  pageSize?: number;
  logger?: StructuredLogger;
}

// =============================================================================
// MessageRouter Class
// =============================================================================

/**
 * Connects the transport to the handlers:
 * - rejects messages the lifecycle state does not allow
 * - dispatches by method
 * - turns handler results and failures into JSON-RPC responses
 */
export class MessageRouter {
  private readonly lifecycleManager: LifecycleManager;
  private readonly toolRegistry: ToolRegistry;
  private readonly toolExecutor: ToolExecutor;
  private readonly loggingHandler: LoggingHandler;
  private readonly pageSize: number | undefined;
  private readonly logger: StructuredLogger;

  constructor(options: MessageRouterOptions) {
    this.lifecycleManager = options.lifecycleManager;
    this.toolRegistry = options.toolRegistry;
    this.toolExecutor = options.toolExecutor;
    this.loggingHandler = options.loggingHandler;
    this.pageSize = options.pageSize;
    this.logger = options.logger ?? new StructuredLogger({ name: 'router' });
  }

  /**
   * Route a JSON-RPC message to its handler.
   *
   * @returns the response for requests, null for notifications
   */
  async handleMessage(
    message: JsonRpcRequest | JsonRpcNotification
  ): Promise<JsonRpcResponse | null> {
    const lifecycleError = this.lifecycleManager.checkPreInitialization(message);
    if (lifecycleError) {
      return isRequest(message) ? lifecycleError : null;
    }

    try {
      if (isRequest(message)) {
        return await this.routeRequest(message);
      }
      this.routeNotification(message);
      return null;
    } catch (error) {
      if (isRequest(message)) {
        return this.toErrorResponse(message.id, message.method, error);
      }

      // Notifications get no response
      this.logger.warning('Notification handler failed', {
        method: message.method,
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async routeRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const { id, method, params } = request;

    switch (method) {
      // =================================================================
      // Lifecycle
      // =================================================================
      case 'initialize': {
        const result = this.lifecycleManager.handleInitialize(params);
        this.logger.info('Client initialized', {
          client: this.lifecycleManager.getClientInfo(),
          protocolVersion: result.protocolVersion,
        });
        return createSuccessResponse(id, result);
      }

      case 'ping':
        return createSuccessResponse(id, {});

      // =================================================================
      // Tools
      // =================================================================
      case 'tools/list': {
        const parseResult = ToolsListParamsSchema.safeParse(params);
        if (!parseResult.success) {
          throw new InvalidParamsError('Invalid params for tools/list', parseResult.error.format());
        }
        return createSuccessResponse(
          id,
          handleToolsList(this.toolRegistry, parseResult.data, this.pageSize)
        );
      }

      case 'tools/call': {
        const parseResult = ToolsCallParamsSchema.safeParse(params);
        if (!parseResult.success) {
          throw new InvalidParamsError('Invalid params for tools/call', parseResult.error.format());
        }
        const result = await handleToolsCall(this.toolExecutor, parseResult.data);
        return createSuccessResponse(id, result);
      }

      // =================================================================
      // Logging
      // =================================================================
      case 'logging/setLevel':
        return createSuccessResponse(id, this.loggingHandler.handleSetLevel(params));

      default:
        return createMethodNotFoundResponse(id, method);
    }
  }

  private routeNotification(notification: JsonRpcNotification): void {
    switch (notification.method) {
      case 'notifications/initialized':
        this.lifecycleManager.handleInitialized();
        return;

      default:
        // Unknown notifications are ignored
        this.logger.debug('Ignoring notification', { method: notification.method });
    }
  }

  private toErrorResponse(id: JsonRpcId, method: string, error: unknown): JsonRpcResponse {
    if (error instanceof LifecycleError) {
      return createErrorResponse(id, error.toJsonRpcError());
    }

    if (!(error instanceof McpError)) {
      this.logger.error('Request handler failed', {
        method,
        message: error instanceof Error ? error.message : String(error),
      });
    }

    return toErrorResponse(fromError(error), id);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createMessageRouter(options: MessageRouterOptions): MessageRouter {
  return new MessageRouter(options);
}
