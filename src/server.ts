/**
 * Main MCP server with graceful shutdown
 *
 * Wires the stdio transport to the message router, tracks in-flight
 * requests, and shuts down on SIGTERM/SIGINT or when stdin closes.
 */

import type { Config } from './config.js';
import { loadConfig } from './config.js';
import { LifecycleManager } from './protocol/lifecycle.js';
import { getDefaultServerCapabilities } from './protocol/capabilities.js';
import {
  createErrorResponse,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type ParseFailure,
} from './protocol/jsonrpc.js';
import { StdioTransport } from './transport/stdio.js';
import { ToolRegistry } from './tools/registry.js';
import { ToolExecutor } from './tools/executor.js';
import { registerDiceTools } from './tools/builtin.js';
import { LoggingHandler } from './logging/handler.js';
import { StructuredLogger } from './observability/logger.js';
import { MessageRouter } from './message-router.js';
import { DiceEngine, type DiceEvaluator } from './dice/engine.js';
import { createSeededRandomSource } from './dice/random.js';

export const SERVER_NAME = 'dice-mcp-server';
export const SERVER_VERSION = '1.0.0';

const SERVER_INSTRUCTIONS =
  'Rolls tabletop RPG dice notation such as 1d20+5 or 4d6kh3. Use roll for totals, ' +
  'roll_detailed for individual dice, roll_batch for several rolls and validate_syntax ' +
  'to check notation without rolling.';

// =============================================================================
// Types
// =============================================================================

export interface ShutdownManagerOptions {
  /**
   * How long to wait for in-flight requests before cleanup runs anyway
   */
  timeoutMs: number;

  /**
   * Optional callback to run after cleanup
   */
  onShutdown?: () => Promise<void>;

  /**
   * Whether to call process.exit() after shutdown completes.
   * Default: true (for CLI usage). Set to false for testing.
   */
  exitProcess?: boolean;

  logger?: StructuredLogger;
}

export interface CleanupHandler {
  name: string;
  cleanup: () => Promise<void>;
}

export interface MCPServerOptions {
  config?: Config;
  /** Defaults to an engine built from the config's limits and seed */
  engine?: DiceEvaluator;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  logger?: StructuredLogger;
  /**
   * Whether to call process.exit() after shutdown completes.
   * Default: true. Set to false for testing.
   */
  exitProcess?: boolean;
  /** Default: true. Tests leave process signals alone. */
  handleSignals?: boolean;
}

// =============================================================================
// ShutdownManager Class
// =============================================================================

/**
 * Manages graceful shutdown of the server
 *
 * @example
 * ```typescript
 * const shutdownManager = new ShutdownManager({ timeoutMs: 10000 });
 *
 * shutdownManager.register('stdio', async () => transport.close());
 *
 * shutdownManager.trackRequest('req-123');
 * // ... process request ...
 * shutdownManager.completeRequest('req-123');
 *
 * shutdownManager.installSignalHandlers();
 * ```
 */
export class ShutdownManager {
  private readonly timeoutMs: number;
  private readonly onShutdown: (() => Promise<void>) | undefined;
  private readonly exitProcess: boolean;
  private readonly logger: StructuredLogger;
  private readonly cleanupHandlers: Map<string, () => Promise<void>> = new Map();
  private readonly inFlightRequests: Set<string> = new Set();

  private shuttingDown: boolean = false;
  private shutdownPromise: Promise<void> | null = null;
  private signalHandlersInstalled: boolean = false;

  private readonly boundSigtermHandler: () => void;
  private readonly boundSigintHandler: () => void;

  constructor(options: ShutdownManagerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.onShutdown = options.onShutdown;
    this.exitProcess = options.exitProcess ?? true;
    this.logger = options.logger ?? new StructuredLogger({ name: 'shutdown' });

    this.boundSigtermHandler = () => {
      void this.initiateShutdown('SIGTERM');
    };
    this.boundSigintHandler = () => {
      void this.initiateShutdown('SIGINT');
    };
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Register a component for cleanup during shutdown.
   * Components are cleaned up in the order they were registered.
   */
  register(name: string, cleanup: () => Promise<void>): void {
    if (this.shuttingDown) {
      throw new Error('Cannot register cleanup handlers during shutdown');
    }
    this.cleanupHandlers.set(name, cleanup);
  }

  unregister(name: string): void {
    this.cleanupHandlers.delete(name);
  }

  /**
   * Track an in-flight request. Requests arriving during shutdown are not tracked.
   */
  trackRequest(requestId: string): void {
    if (!this.shuttingDown) {
      this.inFlightRequests.add(requestId);
    }
  }

  completeRequest(requestId: string): void {
    this.inFlightRequests.delete(requestId);
  }

  getInFlightCount(): number {
    return this.inFlightRequests.size;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  installSignalHandlers(): void {
    if (this.signalHandlersInstalled) {
      return;
    }

    process.on('SIGTERM', this.boundSigtermHandler);
    process.on('SIGINT', this.boundSigintHandler);
    this.signalHandlersInstalled = true;
  }

  removeSignalHandlers(): void {
    if (!this.signalHandlersInstalled) {
      return;
    }

    process.removeListener('SIGTERM', this.boundSigtermHandler);
    process.removeListener('SIGINT', this.boundSigintHandler);
    this.signalHandlersInstalled = false;
  }

  /**
   * Initiate graceful shutdown. Idempotent.
   *
   * 1. Stop tracking new requests
   * 2. Wait for in-flight requests (bounded by the timeout)
   * 3. Run cleanup handlers in registration order
   * 4. Run the onShutdown callback
   */
  async initiateShutdown(signal: string = 'manual'): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shuttingDown = true;
    this.shutdownPromise = this.performShutdown(signal);

    try {
      await this.shutdownPromise;
    } finally {
      this.removeSignalHandlers();
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async performShutdown(signal: string): Promise<void> {
    this.logger.info('Shutting down', { signal });

    await this.waitForInFlightRequests();
    await this.runCleanupHandlers();

    if (this.onShutdown) {
      try {
        await this.onShutdown();
      } catch (error) {
        this.logger.error('onShutdown callback failed', {
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.info('Shutdown complete');

    if (this.exitProcess) {
      process.exit(0);
    }
  }

  private async waitForInFlightRequests(): Promise<void> {
    if (this.inFlightRequests.size === 0) {
      return;
    }

    this.logger.info('Waiting for in-flight requests', { count: this.inFlightRequests.size });

    const startTime = Date.now();

    return new Promise<void>((resolve) => {
      const checkInterval = setInterval(() => {
        if (this.inFlightRequests.size === 0) {
          clearInterval(checkInterval);
          resolve();
          return;
        }

        if (Date.now() - startTime >= this.timeoutMs) {
          clearInterval(checkInterval);
          this.logger.warning('Timed out waiting for in-flight requests', {
            pending: this.inFlightRequests.size,
          });
          resolve();
        }
      }, 50);
    });
  }

  private async runCleanupHandlers(): Promise<void> {
    for (const [name, cleanup] of this.cleanupHandlers) {
      try {
        this.logger.debug('Cleaning up', { component: name });
        await cleanup();
      } catch (error) {
        // Remaining handlers still run
        this.logger.error('Cleanup failed', {
          component: name,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

// =============================================================================
// MCPServer Class
// =============================================================================

/**
 * Dice MCP server over stdio
 *
 * @example
 * ```typescript
 * const server = new MCPServer({ config: loadConfig() });
 * await server.start();
 * // runs until stdin closes or a shutdown signal arrives
 * ```
 */
export class MCPServer {
  private readonly config: Config;
  private readonly exitProcess: boolean;
  private readonly handleSignals: boolean;
  private readonly logger: StructuredLogger;

  private readonly engine: DiceEvaluator;
  private readonly toolRegistry: ToolRegistry;
  private readonly lifecycleManager: LifecycleManager;
  private readonly loggingHandler: LoggingHandler;
  private readonly transport: StdioTransport;
  private readonly router: MessageRouter;

  private shutdownManager: ShutdownManager | null = null;
  private started: boolean = false;
  private requestSequence: number = 0;

  constructor(options: MCPServerOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.exitProcess = options.exitProcess ?? true;
    this.handleSignals = options.handleSignals ?? true;

    this.loggingHandler = new LoggingHandler({ minLevel: this.config.logLevel });
    this.logger =
      options.logger ??
      new StructuredLogger({
        name: 'dice',
        minLevel: this.config.debug ? 'debug' : this.config.logLevel,
        sink: (level, message, data, logger) => this.loggingHandler.log(level, message, data, logger),
      });

    this.engine = options.engine ?? createEngine(this.config);

    this.toolRegistry = new ToolRegistry();
    registerDiceTools(this.toolRegistry, this.engine, { maxBatchSize: this.config.maxBatchSize });

    this.lifecycleManager = new LifecycleManager({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      title: 'Dice Roller',
      capabilities: getDefaultServerCapabilities(),
      instructions: SERVER_INSTRUCTIONS,
    });

    const transportOptions: { stdin?: NodeJS.ReadableStream; stdout?: NodeJS.WritableStream } = {};
    if (options.stdin) transportOptions.stdin = options.stdin;
    if (options.stdout) transportOptions.stdout = options.stdout;
    this.transport = new StdioTransport(transportOptions);

    this.router = new MessageRouter({
      lifecycleManager: this.lifecycleManager,
      toolRegistry: this.toolRegistry,
      toolExecutor: new ToolExecutor(this.toolRegistry, {
        timeoutMs: this.config.requestTimeoutMs,
        validateOutput: this.config.debug,
        logger: this.logger.child('tools'),
      }),
      loggingHandler: this.loggingHandler,
      pageSize: this.config.pageSize,
      logger: this.logger.child('router'),
    });
  }

  /**
   * Start reading stdin. Idempotent.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    this.shutdownManager = new ShutdownManager({
      timeoutMs: this.config.shutdownTimeoutMs,
      exitProcess: this.exitProcess,
      logger: this.logger.child('shutdown'),
    });

    this.shutdownManager.register('lifecycle', async () => {
      this.lifecycleManager.initiateShutdown();
    });
    this.shutdownManager.register('stdio', async () => {
      await this.transport.close();
    });

    if (this.handleSignals) {
      this.shutdownManager.installSignalHandlers();
    }

    // Log notifications only flow once the client has finished the handshake
    this.loggingHandler.setNotificationSender((notification) => {
      if (this.lifecycleManager.isOperational() && !this.transport.isClosed()) {
        this.transport.send(notification);
      }
    });

    this.transport.onMessage((message) => {
      void this.dispatch(message);
    });
    this.transport.onInvalidMessage((failure) => this.rejectInvalid(failure));
    this.transport.onError((error) => {
      this.logger.error('stdin error', { message: error.message });
    });
    this.transport.onEnd(() => {
      void this.stop('stdin closed');
    });

    this.transport.start();
    this.started = true;

    this.logger.info('Server started', {
      tools: this.toolRegistry.getAllTools().map((tool) => tool.name),
      seeded: this.config.seed !== undefined,
    });
  }

  /**
   * Stop the server gracefully
   */
  async stop(reason: string = 'stop'): Promise<void> {
    if (this.shutdownManager) {
      await this.shutdownManager.initiateShutdown(reason);
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  isAcceptingRequests(): boolean {
    return this.started && !this.shutdownManager?.isShuttingDown();
  }

  getShutdownManager(): ShutdownManager | null {
    return this.shutdownManager;
  }

  getToolRegistry(): ToolRegistry {
    return this.toolRegistry;
  }

  getLifecycleManager(): LifecycleManager {
    return this.lifecycleManager;
  }

  getEngine(): DiceEvaluator {
    return this.engine;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async dispatch(message: JsonRpcRequest | JsonRpcNotification): Promise<void> {
    // Client ids may repeat or differ only by type, so track by arrival order
    const requestKey = 'id' in message ? `request-${++this.requestSequence}` : undefined;
    if (requestKey !== undefined) {
      this.shutdownManager?.trackRequest(requestKey);
    }

    try {
      const response = await this.router.handleMessage(message);
      if (response) {
        this.reply(response);
      }
    } catch (error) {
      this.logger.error('Failed to handle message', {
        method: message.method,
        message: error instanceof Error ? error.message : String(error),
      });
    } finally {
      if (requestKey !== undefined) {
        this.shutdownManager?.completeRequest(requestKey);
      }
    }
  }

  private rejectInvalid(failure: ParseFailure): void {
    this.logger.warning('Rejected invalid message', { error: failure.error.message });
    this.reply(createErrorResponse(failure.id ?? null, failure.error));
  }

  private reply(message: JsonRpcMessage): void {
    if (this.transport.isClosed()) {
      this.logger.debug('Dropping reply on closed transport');
      return;
    }
    this.transport.send(message);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Dice engine honoring the configured limits and optional seed
 */
export function createEngine(config: Config): DiceEngine {
  const limits = { maxDice: config.maxDice, maxRerolls: config.maxRerolls };
  if (config.seed !== undefined) {
    return new DiceEngine({ random: createSeededRandomSource(config.seed), limits });
  }
  return new DiceEngine({ limits });
}

export function createShutdownManager(options?: Partial<ShutdownManagerOptions>): ShutdownManager {
  const managerOptions: ShutdownManagerOptions = {
    timeoutMs: options?.timeoutMs ?? 10000,
    exitProcess: options?.exitProcess ?? true,
  };
  if (options?.onShutdown) {
    managerOptions.onShutdown = options.onShutdown;
  }
  if (options?.logger) {
    managerOptions.logger = options.logger;
  }
  return new ShutdownManager(managerOptions);
}
